import cliSpinners from "cli-spinners";
import { disableAnimatedLog } from "../config";
import { logUpdate } from "../logUpdate";
import { statusFailed, statusPending, statusSuccess } from "../theme";
import { STATUS_PENDING, STATUS_REJECTED, STATUS_RESOLVED, Status } from "./createDeferred";

const { dots } = cliSpinners;

export type AsyncOperation = {
  setFailed: (message: string) => void;
  setPending: (message: string) => void;
  setSuccess: (message: string) => void;
};

export function logAsyncOperation(initialMessage: string): AsyncOperation {
  let dotIndex = 0;
  let status: Status = STATUS_PENDING;
  let displayedMessage = initialMessage;

  const print = () => {
    let prefix = "";
    switch (status) {
      case STATUS_PENDING:
        prefix = statusPending(dots.frames[++dotIndex % dots.frames.length]);
        break;
      case STATUS_REJECTED:
        prefix = statusFailed("✘");
        break;
      case STATUS_RESOLVED:
        prefix = statusSuccess("✔");
        break;
    }

    if (displayedMessage) {
      logUpdate(`${prefix} ${displayedMessage}`);
    } else {
      logUpdate.clear();
    }
  };

  print();

  const interval = disableAnimatedLog ? undefined : setInterval(print, dots.interval);

  function assertPending() {
    if (status !== STATUS_PENDING) {
      throw Error(`logAsyncOperation is already in ${status} state`);
    }
  }

  const finalize = () => {
    clearInterval(interval);
    print();
    logUpdate.done();
  };

  return {
    setFailed: (message: string) => {
      assertPending();
      status = STATUS_REJECTED;
      displayedMessage = message;
      finalize();
    },
    setPending: (message: string) => {
      assertPending();
      displayedMessage = message;
      if (disableAnimatedLog) {
        print();
      }
    },
    setSuccess: (message: string) => {
      assertPending();
      status = STATUS_RESOLVED;
      displayedMessage = message;
      finalize();
    },
  };
}
