import { formatTags } from "./logger";
import { ProcessError } from "./ProcessError";

describe("formatTags", () => {
  it("should return undefined without tags", () => {
    expect(formatTags()).toBeUndefined();
  });

  it("should expand errors and keep their extra properties", () => {
    const error = new ProcessError("Process failed (code: 1)", "permission denied", 1);

    expect(formatTags({ command: "brew", error })).toEqual({
      command: "brew",
      error: {
        errorMessage: "Process failed (code: 1)",
        errorName: "Error",
        errorStack: error.stack,
        exitCode: 1,
        stderr: "permission denied",
      },
    });
  });
});
