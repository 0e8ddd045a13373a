import { DITest } from "@tsed/di";
import { PassThrough } from "stream";
import { scriptPrompt } from "../../test/scriptPrompt";
import { InputClosedError, PromptService } from "./PromptService";

describe("PromptService", () => {
  let prompt: PromptService;

  beforeEach(async () => {
    await DITest.create();
    prompt = DITest.get<PromptService>(PromptService);
  });
  afterEach(async () => {
    jest.restoreAllMocks();
    await DITest.reset();
  });

  it("asks again until the answer is not blank", async () => {
    const { ask, output } = scriptPrompt(prompt, ["", "   ", " Alien "]);

    await expect(prompt.askNonEmpty("Title: ", "Title cannot be empty.")).resolves.toBe("Alien");
    expect(ask).toHaveBeenCalledTimes(3);
    expect(output).toEqual(["Title cannot be empty.", "Title cannot be empty."]);
  });

  it("asks again until the answer is a number within bounds", async () => {
    const { output } = scriptPrompt(prompt, ["abc", "", "11", "7.5"]);

    await expect(prompt.askNumber("Rating: ", { min: 1, max: 10 })).resolves.toBe(7.5);
    expect(output).toEqual([
      "Invalid input. Please enter a number.",
      "Invalid input. Please enter a number.",
      "Please enter a number between 1 and 10.",
    ]);
  });

  it("accepts y or n in any case", async () => {
    const { output } = scriptPrompt(prompt, ["maybe", "Y", "n"]);

    await expect(prompt.askYesNo("Latest first? ")).resolves.toBe(true);
    await expect(prompt.askYesNo("Latest first? ")).resolves.toBe(false);
    expect(output).toEqual(["Invalid input. Please enter 'y' for yes or 'n' for no."]);
  });

  it("waits for a bare Enter", async () => {
    const { ask } = scriptPrompt(prompt, ["x", ""]);

    await prompt.waitForEnter();
    expect(ask).toHaveBeenCalledTimes(2);
  });

  it("passes end of input through the helpers", async () => {
    scriptPrompt(prompt, []);

    await expect(prompt.askNonEmpty("Title: ", "Title cannot be empty.")).rejects.toBeInstanceOf(InputClosedError);
  });

  it("keeps lines that arrive before they are asked for", async () => {
    const input = new PassThrough();
    prompt.input = input;
    prompt.output = new PassThrough();
    input.end("1\nAlice\n0\n");

    await expect(prompt.ask("Choice: ")).resolves.toBe("1");
    await expect(prompt.ask("Name: ")).resolves.toBe("Alice");
    await expect(prompt.ask("Choice: ")).resolves.toBe("0");
    await expect(prompt.ask("Choice: ")).rejects.toBeInstanceOf(InputClosedError);
  });
});
