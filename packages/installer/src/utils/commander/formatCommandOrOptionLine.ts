import { dim, highlight, highlightAlternate } from "@bugster-installer/shared/theme";

export function formatCommandOrOptionLine(line: string): string {
  // highlight flags
  line = line.replace(/ (-{1,2}[a-zA-Z0-9\-\_]+)/g, highlightAlternate(" $1"));
  // highlight arguments
  line = line.replace(/ ([<\[][a-zA-Z0-9\-\_\.]+[>\]])/g, highlight(" $1"));
  // highlight default values
  line = line.replace(/\(default: ([^)]+)\)/, dim(`(default: ${highlight("$1")})`));
  return line;
}
