import Enquirer from "enquirer";
import { alwaysConfirm, askUser } from "./confirm";

jest.mock("enquirer", () => ({
  __esModule: true,
  default: { prompt: jest.fn() },
}));

const mockPrompt = jest.mocked(Enquirer.prompt);

describe("confirm", () => {
  beforeEach(() => {
    mockPrompt.mockReset();
  });

  it("should always confirm with --yes", async () => {
    await expect(alwaysConfirm("Install Node.js?")).resolves.toBe(true);
  });

  it("should decline without asking when nobody can answer", async () => {
    await expect(askUser({ isInteractive: false })("Install Node.js?")).resolves.toBe(false);
    expect(mockPrompt).not.toHaveBeenCalled();
  });

  it("should ask the user when interactive", async () => {
    mockPrompt.mockResolvedValueOnce({ confirmed: false });

    await expect(askUser({ isInteractive: true })("Install Node.js?")).resolves.toBe(false);
    expect(mockPrompt).toHaveBeenCalledWith({
      initial: true,
      message: "Install Node.js?",
      name: "confirmed",
      type: "confirm",
    });
  });
});
