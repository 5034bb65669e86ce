import ora from 'ora';

export type Spinner = {
  start(text?: string): Spinner;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
};

/** ora when `interactive`; a silent stub otherwise so piped output stays clean. */
export function createSpinner(
  text: string,
  options: { interactive: boolean; stream?: NodeJS.WriteStream }
): Spinner {
  if (options.interactive) {
    const stream = options.stream ?? process.stderr;
    const instance = ora({ text, stream });
    const wrapped: Spinner = {
      start(msg?: string) {
        instance.start(msg);
        return wrapped;
      },
      succeed(msg?: string) {
        instance.succeed(msg);
      },
      fail(msg?: string) {
        instance.fail(msg);
      },
      stop() {
        instance.stop();
      }
    };
    return wrapped;
  }

  const stub: Spinner = {
    start() {
      return stub;
    },
    succeed() {
      /* no-op */
    },
    fail() {
      /* no-op */
    },
    stop() {
      /* no-op */
    }
  };
  return stub;
}
