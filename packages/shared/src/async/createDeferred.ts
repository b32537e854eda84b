export const STATUS_PENDING = "pending";
export const STATUS_REJECTED = "rejected";
export const STATUS_RESOLVED = "resolved";

export type Status = typeof STATUS_PENDING | typeof STATUS_REJECTED | typeof STATUS_RESOLVED;

export interface Deferred<Type, Data = undefined> {
  data: Data;
  promise: Promise<Type>;
  rejectIfPending(error: Error): void;
  resolveIfPending(value: Type): void;
  status: Status;
}

export function createDeferred<Type, Data = undefined>(data: Data): Deferred<Type, Data> {
  let status: Status = STATUS_PENDING;

  let rejectPromise: (error: Error) => void = () => {};
  let resolvePromise: (value: Type) => void = () => {};

  const promise = new Promise<Type>((resolve, reject) => {
    rejectPromise = reject;
    resolvePromise = resolve;
  });
  promise.catch(() => {
    // Prevent unhandled promise rejection warning.
  });

  return {
    data,
    promise,

    rejectIfPending(error: Error) {
      if (status === STATUS_PENDING) {
        status = STATUS_REJECTED;
        rejectPromise(error);
      }
    },

    resolveIfPending(value: Type) {
      if (status === STATUS_PENDING) {
        status = STATUS_RESOLVED;
        resolvePromise(value);
      }
    },

    get status() {
      return status;
    },
  };
}
