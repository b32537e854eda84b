import { Help, program } from "commander";
import { formatOutput } from "./formatOutput";

export function finalizeCommander(argv?: string[]) {
  program.configureHelp({
    formatHelp: (command, helper) => {
      const help = new Help();
      const helpText = help.formatHelp(command, helper);
      return formatOutput(helpText);
    },
    sortOptions: true,
  });
  program.configureOutput({
    writeErr: (text: string) => process.stderr.write(formatOutput(text)),
    writeOut: (text: string) => process.stdout.write(formatOutput(text)),
  });
  program.helpOption("-h, --help", "Display help for command");

  return program.parseAsync(argv);
}
