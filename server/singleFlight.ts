export type SingleFlightOutcome<T> =
  | { status: "completed"; value: T }
  | { status: "busy" };

/**
 * Wrap a task so at most one invocation runs at a time in this process.
 * Calls made while it is running return `busy` instead of starting another.
 */
export function createSingleFlightRunner<T>(
  task: () => Promise<T>
): () => Promise<SingleFlightOutcome<T>> {
  let running = false;

  return async () => {
    if (running) {
      return { status: "busy" };
    }
    running = true;
    try {
      return { status: "completed", value: await task() };
    } finally {
      running = false;
    }
  };
}
