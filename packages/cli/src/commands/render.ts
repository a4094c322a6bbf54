import { createPromptService, loadRunConfig, type GlobalOptions } from "./shared.js";

export interface RenderOptions extends GlobalOptions {
  template: string;
  vars: Record<string, string>;
  title?: string;
  author?: string;
}

export async function runRender(options: RenderOptions): Promise<void> {
  if (!options.template) {
    throw new Error("render needs a template id, e.g. `review-prompts render summary`");
  }

  const config = loadRunConfig(options);
  const service = await createPromptService(config);

  const prompt = service.preparePrompt(options.template, {
    reviewTitle: options.title,
    reviewAuthor: options.author,
    extra: options.vars,
  });

  process.stdout.write(`${prompt}\n`);
}
