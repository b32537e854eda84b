import strip from "strip-ansi";
import { drawBoxAroundText } from "./formatting";

describe("drawBoxAroundText", () => {
  it("should size the box to the widest line", () => {
    expect(strip(drawBoxAroundText("one\nthree", { maxWidth: 80 })).split("\n")).toEqual([
      "┌─────┐",
      "│one  │",
      "│three│",
      "└─────┘",
    ]);
  });

  it("should fit a header that is wider than the content", () => {
    expect(
      strip(drawBoxAroundText("ab", { headerLabel: "Options", maxWidth: 80 })).split("\n")
    ).toEqual(["┌ Options ┐", "│ab       │", "└─────────┘"]);
  });

  it("should fall back to a plain list when the terminal is too narrow", () => {
    expect(
      strip(drawBoxAroundText("a long line of text", { headerLabel: "Options", maxWidth: 10 }))
    ).toBe("Options:\na long line of text");
  });
});
