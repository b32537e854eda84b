import strip from "strip-ansi";
import { dim } from "./theme";

export function drawBoxAroundText(
  text: string,
  options: {
    headerLabel?: string;
    maxWidth?: number;
  }
) {
  const { headerLabel, maxWidth = process.stdout.columns } = options;

  const lines = text.split("\n").filter(Boolean);
  const headerWithPadding = headerLabel ? ` ${headerLabel} ` : "";
  const lineLength = lines.reduce((maxLength, line) => {
    const length = strip(line).length;
    return Math.max(maxLength, length);
  }, headerWithPadding.length);

  // Narrow terminals get a plain labelled list instead of a box
  if (maxWidth && lineLength + 2 > maxWidth) {
    return headerLabel ? `${dim(`${headerLabel}:`)}\n${lines.join("\n")}` : lines.join("\n");
  }

  const formatted: string[] = [];
  if (headerLabel) {
    formatted.push(
      dim(`┌${headerWithPadding}${"─".repeat(lineLength - headerWithPadding.length)}┐`)
    );
  } else {
    formatted.push(dim(`┌${"─".repeat(lineLength)}┐`));
  }

  lines.forEach(line => {
    const delta = lineLength - strip(line).length;
    const padding = delta > 0 ? " ".repeat(delta) : "";
    formatted.push(`${dim("│")}${line}${padding}${dim("│")}`);
  });

  formatted.push(dim(`└${"─".repeat(lineLength)}┘`));

  return formatted.join("\n");
}
