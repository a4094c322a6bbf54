/**
 * Template registry.
 *
 * Holds every loaded template under its identifier. Templates are frozen on
 * registration and an identifier can be registered only once, so the
 * registry is safe to share between concurrent renders.
 */

import { NotFoundError } from "../errors.js";
import { logger } from "../logger.js";
import { templateSources, type PromptConfig } from "../prompts/settings.js";
import { loadPromptSource, type PromptSourceLoader } from "../prompts/sources.js";
import type { Template } from "./template.js";

/** Separator between the texts of a multi-source template. */
export const SOURCE_SEPARATOR = "\n\n";

export class TemplateRegistry {
  private templates = new Map<string, Template>();

  /**
   * Load every built-in template id from the sources the prompt config
   * resolves to. Sources of one template are read in order and joined with
   * a blank line.
   */
  static async fromConfig(
    config: PromptConfig,
    loader: PromptSourceLoader = (source) => loadPromptSource(source),
  ): Promise<TemplateRegistry> {
    const registry = new TemplateRegistry();

    for (const [id, sources] of templateSources(config)) {
      const texts: string[] = [];
      for (const source of sources) {
        texts.push(await loader(source));
      }
      registry.register(id, texts.join(SOURCE_SEPARATOR), sources);
    }

    logger.debug(`Loaded ${registry.templates.size} templates`);
    return registry;
  }

  register(id: string, text: string, sources: readonly string[] = []): Template {
    if (this.templates.has(id)) {
      throw new Error(`Template "${id}" is already registered`);
    }

    const template: Template = Object.freeze({
      id,
      text,
      sources: Object.freeze([...sources]),
    });
    this.templates.set(id, template);
    return template;
  }

  get(id: string): Template {
    const template = this.templates.get(id);
    if (!template) throw new NotFoundError(id);
    return template;
  }

  has(id: string): boolean {
    return this.templates.has(id);
  }

  /** All templates, sorted by id. */
  list(): Template[] {
    return [...this.templates.values()].sort((a, b) => a.id.localeCompare(b.id));
  }
}
