import prompts, { type PromptObject } from "prompts";

type NamedPrompt = PromptObject<"value">;

// Cancelling (Ctrl-C / Esc) resolves to undefined instead of exiting.
async function ask(q: NamedPrompt): Promise<string | undefined> {
  const res = await prompts(q, { onCancel: () => void 0 });
  const value: unknown = res.value;
  return typeof value === "string" ? value : undefined;
}

type PromptOpts = { message: string; validate?: (v: string) => boolean | string };

export const Input = {
  async prompt(opts: PromptOpts) {
    return await ask({
      type: "text",
      name: "value",
      message: opts.message,
      validate: opts.validate,
    });
  },
};

export const Secret = {
  async prompt(opts: PromptOpts) {
    return await ask({
      type: "password",
      name: "value",
      message: opts.message,
      validate: opts.validate,
    });
  },
};
