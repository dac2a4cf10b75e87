export interface RigLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export class ConsoleRigLogger implements RigLogger {
  constructor(private readonly verbose = false) {}

  debug(...args: unknown[]): void {
    if (this.verbose) {
      console.debug("[kinetic-rig]", ...args);
    }
  }

  info(...args: unknown[]): void {
    console.info("[kinetic-rig]", ...args);
  }

  warn(...args: unknown[]): void {
    console.warn("[kinetic-rig]", ...args);
  }

  error(...args: unknown[]): void {
    console.error("[kinetic-rig]", ...args);
  }
}

export const defaultRigLogger: RigLogger = new ConsoleRigLogger();
