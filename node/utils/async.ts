export function delay(ms: number) {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

/** A promise whose settlement is driven from the outside. */
export class Defer<T> {
  public promise: Promise<T>;
  public resolve: (val: T) => void;
  public reject: (err: Error) => void;
  public settled: boolean = false;

  constructor() {
    let resolve: ((val: T) => void) | undefined;
    let reject: ((err: Error) => void) | undefined;

    this.promise = new Promise<T>((fnRes, fnRej) => {
      resolve = fnRes;
      reject = fnRej;
    });

    this.resolve = (val) => {
      if (resolve != undefined) {
        resolve(val);
      }
      this.settled = true;
    };

    this.reject = (err) => {
      if (reject != undefined) {
        reject(err);
      }
      this.settled = true;
    };
  }
}

/** poll fn until it stops throwing, or fail after opts.timeout ms.
 */
export async function pollUntil<T>(
  fn: () => T | Promise<T>,
  opts: { timeout: number; message?: string } = { timeout: 1000 },
): Promise<T> {
  const start = Date.now();
  let lastError: Error | undefined;
  while (true) {
    if (Date.now() - start > opts.timeout) {
      if (opts.message) {
        throw new Error(opts.message);
      }

      if (lastError) {
        throw lastError;
      }

      throw new Error(`pollUntil timeout`);
    }

    try {
      return await fn();
    } catch (e) {
      lastError = e instanceof Error ? e : new Error(String(e));
    }

    await delay(20);
  }
}
