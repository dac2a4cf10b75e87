import { afterEach, describe, expect, it, vi } from "vitest";
import { Vector3 } from "three";
import { IDLE_TICK_INTERVAL, RigSession, TICK_INTERVAL, clonePose, eulerXYZ, resolveRigConfig } from "../src";
import type { PoseReadResult, RigLogger, ViewPose, ViewportHost } from "../src";

class FakeHost implements ViewportHost {
  readonly poses = new Map<string, ViewPose>();
  readonly redraws: string[] = [];
  readonly listed: string[];

  constructor(ids: string[]) {
    this.listed = ids;
    for (const id of ids) {
      this.poses.set(id, {
        location: new Vector3(),
        orientation: eulerXYZ(1, 0, 0.4),
        distance: 10,
        isPerspective: true,
      });
    }
  }

  listViewports(): string[] {
    return this.listed;
  }

  readPose(viewportId: string): PoseReadResult {
    const pose = this.poses.get(viewportId);
    return pose ? { ok: true, pose: clonePose(pose) } : { ok: false, reason: "viewport-unavailable" };
  }

  writePose(viewportId: string, pose: ViewPose): void {
    this.poses.set(viewportId, clonePose(pose));
  }

  requestRedraw(viewportId: string): void {
    this.redraws.push(viewportId);
  }

  nudge(viewportId: string, dx: number): void {
    const pose = this.poses.get(viewportId);
    if (pose) pose.location.x += dx;
  }
}

function spyLogger(): RigLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeSession(host: ViewportHost, logger = spyLogger()) {
  let t = 0;
  const clock = { now: () => (t += 0.01) };
  const config = vi.fn(() => ({ autoPilotEnabled: false, driftEnabled: false }));
  const session = new RigSession({ host, clock, logger, config });
  return { session, logger, config };
}

describe("RigSession", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates one rig per viewport on first tick", () => {
    const host = new FakeHost(["left", "right"]);
    const { session, config } = makeSession(host);
    expect(session.getViewportIds()).toEqual([]);
    session.tickAll();
    expect(session.getViewportIds()).toEqual(["left", "right"]);
    expect(session.getRig("left")).not.toBe(session.getRig("right"));
    expect(config).toHaveBeenCalledTimes(1);
  });

  it("slows down once every rig is resting", () => {
    const host = new FakeHost(["main"]);
    const { session } = makeSession(host);
    expect(session.tickAll()).toBe(IDLE_TICK_INTERVAL);
    host.nudge("main", 0.1);
    expect(session.tickAll()).toBe(TICK_INTERVAL);
  });

  it("writes coasting poses back and requests a redraw", () => {
    const host = new FakeHost(["main"]);
    const { session } = makeSession(host);
    session.tickAll();
    for (let i = 0; i < 3; i++) {
      host.nudge("main", 0.1);
      session.tickAll();
    }
    expect(host.redraws).toEqual([]);
    session.tickAll();
    expect(host.redraws).toEqual(["main"]);
    expect(host.poses.get("main")?.location.x).toBeGreaterThan(0.3);
  });

  it("skips viewports without a pose", () => {
    const host = new FakeHost(["main"]);
    host.listed.push("ghost");
    const { session, logger } = makeSession(host);
    session.tickAll();
    expect(session.getViewportIds()).toEqual(["main"]);
    expect(logger.debug).toHaveBeenCalledWith("viewport ghost skipped: viewport-unavailable");
  });

  it("logs and skips a viewport whose tick throws", () => {
    const host = new FakeHost(["broken", "main"]);
    const failure = new Error("pose read failed");
    const readPose = host.readPose.bind(host);
    host.readPose = (id: string) => {
      if (id === "broken") throw failure;
      return readPose(id);
    };
    const { session, logger } = makeSession(host);

    expect(session.tickViewport("broken", resolveRigConfig())).toEqual({
      status: "skipped",
      reason: "tick-failed",
    });
    session.tickAll();
    expect(logger.error).toHaveBeenCalledWith("viewport broken tick failed", failure);
    expect(session.getViewportIds()).toEqual(["main"]);
  });

  it("logs a failed pass and keeps the timer running", () => {
    vi.useFakeTimers();
    const host = new FakeHost(["main"]);
    const readSpy = vi.spyOn(host, "readPose");
    const { session, logger, config } = makeSession(host);
    const failure = new Error("settings store gone");
    config.mockImplementationOnce(() => {
      throw failure;
    });

    session.start();
    vi.advanceTimersByTime(10);
    expect(logger.error).toHaveBeenCalledWith("tick pass failed", failure);
    expect(readSpy).not.toHaveBeenCalled();
    expect(session.isRunning()).toBe(true);

    vi.advanceTimersByTime(10);
    expect(readSpy).toHaveBeenCalledTimes(1);
    session.stop();
  });

  it("returns the busy interval when the host cannot list viewports", () => {
    const host = new FakeHost(["main"]);
    const failure = new Error("no window");
    host.listViewports = () => {
      throw failure;
    };
    const { session, logger } = makeSession(host);
    expect(session.tickAll()).toBe(TICK_INTERVAL);
    expect(logger.error).toHaveBeenCalledWith("tick pass failed", failure);
  });

  it("abandons the pass when stopped from a host callback", () => {
    const host = new FakeHost(["first", "second"]);
    const { session } = makeSession(host);
    const readPose = host.readPose.bind(host);
    const readSpy = vi.fn((id: string) => {
      if (id === "first") session.stop();
      return readPose(id);
    });
    host.readPose = readSpy;

    session.tickAll();
    expect(readSpy.mock.calls.map(([id]) => id)).toEqual(["first"]);
    expect(session.getViewportIds()).toEqual([]);
  });

  it("runs on a timer until stopped and then discards every rig", () => {
    vi.useFakeTimers();
    const host = new FakeHost(["main"]);
    const readSpy = vi.spyOn(host, "readPose");
    const { session } = makeSession(host);

    session.start();
    expect(session.isRunning()).toBe(true);
    vi.advanceTimersByTime(10);
    expect(readSpy).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(100);
    expect(readSpy).toHaveBeenCalledTimes(2);

    session.stop();
    expect(session.isRunning()).toBe(false);
    expect(session.getViewportIds()).toEqual([]);
    vi.advanceTimersByTime(1000);
    expect(readSpy).toHaveBeenCalledTimes(2);
  });
});
