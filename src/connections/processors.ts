/**
 * A step that transforms a request before it is sent or a response after it
 * arrives. Steps run in registration order, each receiving the previous
 * step's output.
 */
export type ProcessorStep<T> = (value: T) => T | Promise<T>;

export const runProcessors = async <T>(value: T, steps: readonly ProcessorStep<T>[]): Promise<T> => {
  let current = value;
  for (const step of steps) {
    current = await step(current);
  }
  return current;
};
