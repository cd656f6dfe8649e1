import { createLogger } from "../utils/logger.js";

const log = createLogger("process");

/** Liveness checks and signalling by persisted handle. */
export interface ProcessControl {
  isAlive(handle: string): boolean;
  terminate(handle: string): boolean;
  kill(handle: string): boolean;
}

export type ParsedHandle =
  | { kind: "pid"; pid: number }
  | { kind: "local"; pid: number; runId: string };

/**
 * `pid:<n>` for child processes, `local:<owner pid>:<runId>` for in-process
 * work. Pids must be positive: signalling 0 or a negative pid reaches whole
 * process groups.
 */
export function parseHandle(handle: string): ParsedHandle | undefined {
  const pidMatch = /^pid:([1-9]\d*)$/.exec(handle);
  if (pidMatch) return { kind: "pid", pid: Number(pidMatch[1]) };
  const localMatch = /^local:([1-9]\d*):(.+)$/.exec(handle);
  if (localMatch) return { kind: "local", pid: Number(localMatch[1]), runId: localMatch[2] };
  return undefined;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function pidExists(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists, owned by someone else
    return hasCode(err, "EPERM");
  }
}

/**
 * OS-backed process control. Child processes run as their own process
 * group, so signals go to the whole group first.
 *
 * In-process work belonging to this process is never reported alive here:
 * the owning manager knows its own runs. Work owned by another process is
 * alive as long as that process is.
 */
export class OsProcessControl implements ProcessControl {
  isAlive(handle: string): boolean {
    const parsed = parseHandle(handle);
    if (!parsed) return false;
    if (parsed.kind === "local" && parsed.pid === process.pid) return false;
    return pidExists(parsed.pid);
  }

  terminate(handle: string): boolean {
    return this.signal(handle, "SIGTERM");
  }

  kill(handle: string): boolean {
    return this.signal(handle, "SIGKILL");
  }

  private signal(handle: string, signal: NodeJS.Signals): boolean {
    const parsed = parseHandle(handle);
    if (parsed?.kind !== "pid") {
      log.debug(`Cannot signal handle "${handle}"`);
      return false;
    }
    try {
      process.kill(-parsed.pid, signal);
      return true;
    } catch (groupErr) {
      log.debug(`Group signal failed, signalling process`, { pid: parsed.pid, error: String(groupErr) });
    }
    try {
      process.kill(parsed.pid, signal);
      return true;
    } catch (err) {
      log.debug(`Signal ${signal} not delivered`, { pid: parsed.pid, error: String(err) });
      return false;
    }
  }
}
