import { drawBoxAroundText } from "@bugster-installer/shared/formatting";
import { highlight, highlightAlternate } from "@bugster-installer/shared/theme";
import { formatCommandOrOptionLine } from "./formatCommandOrOptionLine";
import { Block } from "./types";

const BLOCK_LABELS = ["Arguments:", "Options:"];

// Draws boxes around commander's help sections
export function formatOutput(originalText: string): string {
  const blocks: Block[] = [];
  const lines: string[] = [];

  let currentBlock: Block | null = null;

  for (let line of originalText.split("\n")) {
    if (currentBlock != null) {
      if (line.trim()) {
        currentBlock.lines.push(formatCommandOrOptionLine(line));
        continue;
      }

      blocks.push(currentBlock);
      currentBlock = null;
    } else if (BLOCK_LABELS.some(label => line.startsWith(label))) {
      currentBlock = {
        label: line.replace(":", "").trim(),
        lines: [],
      };
    } else {
      if (line.startsWith("Usage:")) {
        line = line.replace(/ (-{1,2}[a-zA-Z0-9\-\_]+)/g, highlightAlternate(" $1"));
        line = line.replace(/ ([<\[][a-zA-Z0-9\-\_\.]+[>\]])/g, highlight(" $1"));
      }

      lines.push(line);
    }
  }

  if (currentBlock != null) {
    blocks.push(currentBlock);
  }

  blocks.forEach(block => {
    const blockText = block.lines.map(line => `${line}  `).join("\n");
    const boxedText = drawBoxAroundText(blockText, { headerLabel: block.label }) + "\n";

    lines.push(...boxedText.split("\n"));
  });

  return lines.join("\n");
}
