import type { Clock, RigConfig, SelectionSource, TickOutcome, ViewportHost } from "./types";
import { IDLE_TICK_INTERVAL, TICK_INTERVAL, resolveRigConfig } from "./config";
import { KineticRig } from "./KineticRig";
import { defaultRigLogger, type RigLogger } from "./logger";

export interface RigSessionOptions {
  host: ViewportHost;
  selection?: SelectionSource;
  /** Read once per pass; the session never caches it. */
  config?: () => Partial<RigConfig>;
  clock?: Clock;
  logger?: RigLogger;
}

const performanceClock: Clock = {
  now: () => performance.now() / 1000,
};

/**
 * Owns one rig per viewport id for as long as the session runs. Rigs are
 * created the first time a viewport is ticked and all are dropped on stop.
 */
export class RigSession {
  private readonly rigs = new Map<string, KineticRig>();
  private readonly clock: Clock;
  private readonly logger: RigLogger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Bumped by `stop()` so a pass in flight knows to abandon its rigs. */
  private generation = 0;

  constructor(private readonly options: RigSessionOptions) {
    this.clock = options.clock ?? performanceClock;
    this.logger = options.logger ?? defaultRigLogger;
  }

  start(): void {
    if (this.timer) return;
    this.logger.info("kinetic session started");
    this.schedule(TICK_INTERVAL);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.logger.info("kinetic session stopped");
    }
    this.generation++;
    this.rigs.clear();
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Ticks every viewport the host lists once. Returns the delay in seconds
   * before the next pass should run. A pass that fails outside any single
   * viewport is logged and skipped.
   */
  tickAll(): number {
    const generation = this.generation;
    try {
      const config = resolveRigConfig(this.options.config?.());
      let allResting = true;
      for (const viewportId of this.options.host.listViewports()) {
        const outcome = this.tickViewport(viewportId, config);
        if (this.generation !== generation) break;
        if (outcome.status !== "updated" || !outcome.resting) {
          allResting = false;
        }
      }
      return allResting ? IDLE_TICK_INTERVAL : TICK_INTERVAL;
    } catch (err) {
      this.logger.error("tick pass failed", err);
      return TICK_INTERVAL;
    } finally {
      if (this.generation !== generation) {
        this.rigs.clear();
      }
    }
  }

  tickViewport(viewportId: string, config: RigConfig): TickOutcome {
    const { host, selection } = this.options;
    try {
      const read = host.readPose(viewportId);
      if (!read.ok) {
        this.logger.debug(`viewport ${viewportId} skipped: ${read.reason}`);
        return { status: "skipped", reason: read.reason };
      }

      const rig = this.ensureRig(viewportId);
      const { outcome, pose } = rig.tick({
        pose: read.pose,
        config,
        now: this.clock.now(),
        selection,
      });
      if (pose) {
        host.writePose(viewportId, pose);
      }
      if (outcome.status === "updated" && outcome.redraw) {
        host.requestRedraw(viewportId);
      }
      return outcome;
    } catch (err) {
      this.logger.error(`viewport ${viewportId} tick failed`, err);
      return { status: "skipped", reason: "tick-failed" };
    }
  }

  getRig(viewportId: string): KineticRig | undefined {
    return this.rigs.get(viewportId);
  }

  getViewportIds(): string[] {
    return [...this.rigs.keys()];
  }

  private ensureRig(viewportId: string): KineticRig {
    let rig = this.rigs.get(viewportId);
    if (!rig) {
      rig = new KineticRig();
      this.rigs.set(viewportId, rig);
      this.logger.debug(`rig created for viewport ${viewportId}`);
    }
    return rig;
  }

  private schedule(delaySeconds: number): void {
    this.timer = setTimeout(() => {
      const next = this.tickAll();
      if (this.timer !== null) {
        this.schedule(next);
      }
    }, delaySeconds * 1000);
  }
}
