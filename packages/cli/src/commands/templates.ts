import { TemplateRegistry, TemplateRenderer } from "@review-prompts/engine";
import { formatTemplatesTable } from "../formatter.js";
import { loadRunConfig, type GlobalOptions } from "./shared.js";

export async function runTemplates(options: GlobalOptions): Promise<void> {
  const config = loadRunConfig(options);
  const registry = await TemplateRegistry.fromConfig(config.prompt);
  const renderer = new TemplateRenderer(registry, { placeholder: config.prompt.context_placeholder });

  const rows = registry.list().map((t) => ({
    id: t.id,
    sources: t.sources,
    placeholders: renderer.placeholders(t.id),
  }));

  process.stdout.write(formatTemplatesTable(rows));
}
