import { strict as assert } from "assert";
import { PassThrough } from "node:stream";
import { createPrompter } from "./prompt";

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("createPrompter", () => {
  const warnings: string[] = [];
  const onWarning = (warning: Error) => warnings.push(warning.name);

  beforeEach(() => {
    warnings.length = 0;
    process.on("warning", onWarning);
  });
  afterEach(() => {
    process.off("warning", onWarning);
  });

  it("answers many questions without piling up listeners", async () => {
    const input = new PassThrough();
    const prompter = createPrompter(input, new PassThrough());

    for (let i = 0; i < 15; i++) {
      const answer = prompter.ask("> ");
      input.write(`line ${i}\n`);
      assert.equal(await answer, `line ${i}`);
    }
    await nextTurn();
    prompter.close();

    assert.deepEqual(warnings, []);
  });

  it("resolves the waiting question with null when closed", async () => {
    const prompter = createPrompter(new PassThrough(), new PassThrough());

    const answer = prompter.ask("> ");
    prompter.close();

    assert.equal(await answer, null);
    assert.equal(await prompter.ask("> "), null);
  });
});
