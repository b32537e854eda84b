import Enquirer from "enquirer";
import { logDebug, logInfo } from "../logger";

export type ConfirmPolicy = (message: string) => Promise<boolean>;

export const alwaysConfirm: ConfirmPolicy = async message => {
  logInfo("Confirm:AutoConfirmed", { message });
  return true;
};

export function askUser({
  defaultValue = true,
  isInteractive = !!process.stdin.isTTY,
}: {
  defaultValue?: boolean;
  isInteractive?: boolean;
} = {}): ConfirmPolicy {
  return async message => {
    if (!isInteractive) {
      // There is no one to answer (e.g. the installer was piped into a shell)
      logInfo("Confirm:NotInteractive", { message });
      return false;
    }

    const { confirmed } = await Enquirer.prompt<{ confirmed: boolean }>({
      initial: defaultValue,
      message,
      name: "confirmed",
      type: "confirm",
    });

    logDebug("Confirm:Answered", { confirmed, message });

    return confirmed === true;
  };
}
