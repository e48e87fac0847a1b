/**
 * Line Target
 * Contract shared by every line-oriented transport (TCP, WebSocket, HTTP)
 */

export interface LineTarget {
  handleCommand(line: string): string | null | Promise<string | null>;
}

export interface CommandQueue {
  /** Run fn after every previously queued fn has settled */
  run<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Serializes command execution per client so responses leave in arrival
 * order, even when the target answers asynchronously.
 */
export function createCommandQueue(): CommandQueue {
  let commandLock: Promise<void> = Promise.resolve();

  return {
    run<T>(fn: () => Promise<T>): Promise<T> {
      const previousLock = commandLock;
      let releaseLock: () => void = () => {};
      commandLock = new Promise<void>(resolve => {
        releaseLock = resolve;
      });
      return previousLock.then(fn).finally(() => releaseLock());
    },
  };
}

/**
 * Trim a raw line and forward it to the target.
 * Blank lines are skipped without reaching the dispatcher.
 */
export async function executeLine(target: LineTarget, raw: string): Promise<string | null> {
  const command = raw.trim();
  if (command === '') return null;
  return target.handleCommand(command);
}
