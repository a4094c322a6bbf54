/**
 * Template renderer.
 *
 * Pure string substitution: find placeholder tokens, replace each with its
 * value from the render context or the configured defaults. Values are
 * inserted literally in a single pass and never rescanned, so content that
 * looks like a placeholder (or like an instruction) inside a value is
 * carried through untouched.
 */

import { MissingVariableError } from "../errors.js";
import {
  compilePlaceholder,
  listPlaceholders,
  type PlaceholderSyntax,
} from "./placeholder.js";
import type { TemplateRegistry } from "./registry.js";
import type { RenderContext } from "./template.js";

export interface TemplateRendererOptions {
  /** Placeholder pattern containing `{value}`; defaults to `<<{value}>>`. */
  placeholder?: string;
  /** Fallback values for names the render context does not provide. */
  defaults?: RenderContext;
}

const INLINE_TEMPLATE_ID = "<inline>";

export class TemplateRenderer {
  readonly syntax: PlaceholderSyntax;
  private registry: TemplateRegistry;
  private defaults: RenderContext;

  constructor(registry: TemplateRegistry, options: TemplateRendererOptions = {}) {
    this.registry = registry;
    this.syntax = compilePlaceholder(options.placeholder);
    this.defaults = { ...options.defaults };
  }

  /**
   * Render a registered template.
   *
   * @throws NotFoundError when `templateId` is not registered.
   * @throws MissingVariableError listing every unresolved placeholder.
   */
  render(templateId: string, context: RenderContext = {}): string {
    const template = this.registry.get(templateId);
    return this.renderText(template.text, context, template.id);
  }

  renderText(text: string, context: RenderContext = {}, templateId = INLINE_TEMPLATE_ID): string {
    const missing = listPlaceholders(text, this.syntax).filter(
      (name) => this.resolve(name, context) === undefined,
    );
    if (missing.length > 0) {
      throw new MissingVariableError(templateId, missing);
    }

    return text.replace(this.syntax.regex(), (token, name: string) => this.resolve(name, context) ?? token);
  }

  /** Placeholder names used by a registered template. */
  placeholders(templateId: string): string[] {
    return listPlaceholders(this.registry.get(templateId).text, this.syntax);
  }

  private resolve(name: string, context: RenderContext): string | undefined {
    if (Object.hasOwn(context, name)) return context[name];
    if (Object.hasOwn(this.defaults, name)) return this.defaults[name];
    return undefined;
  }
}
