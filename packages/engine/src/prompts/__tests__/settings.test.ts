import { describe, it, expect } from "vitest";
import {
  defaultPromptConfig,
  resolvePromptFiles,
  resolveSystemPromptFiles,
  templateSources,
} from "../settings.js";
import { builtinPromptPath } from "../builtin.js";
import { TEMPLATE_IDS } from "../../templates/template.js";

describe("resolvePromptFiles", () => {
  it("uses configured files when there are any", () => {
    expect(resolvePromptFiles(["a.md", "b.md"], "default_inline.md")).toEqual(["a.md", "b.md"]);
  });

  it("falls back to the built-in file when unset or empty", () => {
    const builtin = [builtinPromptPath("default_inline.md")];
    expect(resolvePromptFiles(undefined, "default_inline.md")).toEqual(builtin);
    expect(resolvePromptFiles([], "default_inline.md")).toEqual(builtin);
  });
});

describe("resolveSystemPromptFiles", () => {
  const global = builtinPromptPath("default_system_inline.md");

  it("uses the built-in system file when nothing is configured", () => {
    expect(resolveSystemPromptFiles(undefined, true, "default_system_inline.md")).toEqual([global]);
    expect(resolveSystemPromptFiles(undefined, false, "default_system_inline.md")).toEqual([global]);
  });

  it("appends configured files after the built-in one when included", () => {
    expect(resolveSystemPromptFiles(["team.md"], true, "default_system_inline.md")).toEqual([global, "team.md"]);
  });

  it("replaces the built-in file when not included", () => {
    expect(resolveSystemPromptFiles(["team.md"], false, "default_system_inline.md")).toEqual(["team.md"]);
  });
});

describe("templateSources", () => {
  it("covers every template id with the built-in files by default", () => {
    const sources = templateSources(defaultPromptConfig());
    expect([...sources.keys()]).toEqual([...TEMPLATE_IDS]);
    expect(sources.get("summary_reply")).toEqual([builtinPromptPath("default_summary_reply.md")]);
    expect(sources.get("system_context")).toEqual([builtinPromptPath("default_system_context.md")]);
  });

  it("applies per-kind overrides", () => {
    const config = defaultPromptConfig();
    config.files.summary = ["/team/summary.md"];
    config.system_files.inline = ["/team/system.md"];
    config.include_system.inline = false;

    const sources = templateSources(config);
    expect(sources.get("summary")).toEqual(["/team/summary.md"]);
    expect(sources.get("system_inline")).toEqual(["/team/system.md"]);
    expect(sources.get("inline")).toEqual([builtinPromptPath("default_inline.md")]);
  });
});
