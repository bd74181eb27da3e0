// snb-adapters - Query Template Store

import * as fs from "fs";
import * as path from "path";
import { TemplateLoadError, TemplateRenderError } from "./errors.js";
import { operationNumber, type OperationTag } from "./operations.js";
import type { LiteralDialect, TemplateValue } from "./types.js";

const PLACEHOLDER = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * File name of the template for a tag, e.g. Query4 -> interactive-complex-4.sql
 */
export function templateFileName(tag: OperationTag, extension: string): string {
  const n = operationNumber(tag);
  if (tag.startsWith("ShortQuery")) return `interactive-short-${n}.${extension}`;
  if (tag.startsWith("Update")) return `interactive-update-${n}.${extension}`;
  return `interactive-complex-${n}.${extension}`;
}

/**
 * Immutable set of query templates, loaded once and shared by all workers.
 */
export class TemplateStore {
  readonly directory: string;
  readonly extension: string;
  private readonly templates: ReadonlyMap<OperationTag, string>;

  constructor(directory: string, extension: string, templates: Map<OperationTag, string>) {
    this.directory = directory;
    this.extension = extension;
    this.templates = new Map(templates);
    Object.freeze(this);
  }

  has(tag: OperationTag): boolean {
    return this.templates.has(tag);
  }

  tags(): OperationTag[] {
    return [...this.templates.keys()];
  }

  /**
   * Raw template text.
   */
  get(tag: OperationTag): string {
    const text = this.templates.get(tag);
    if (text === undefined) {
      throw new TemplateLoadError(this.directory, [templateFileName(tag, this.extension)]);
    }
    return text;
  }

  /**
   * Substitute every `$name` placeholder with the dialect literal of
   * `params[name]`. The stored template is left untouched.
   */
  render(
    tag: OperationTag,
    params: Readonly<Record<string, TemplateValue>>,
    dialect: LiteralDialect
  ): string {
    return this.get(tag).replace(PLACEHOLDER, (_match, name: string) => {
      if (!Object.hasOwn(params, name)) {
        throw new TemplateRenderError(tag, name, "no such parameter");
      }
      return formatLiteral(tag, name, params[name], dialect);
    });
  }
}

function formatLiteral(
  tag: OperationTag,
  name: string,
  value: TemplateValue,
  dialect: LiteralDialect
): string {
  if (typeof value === "string") return dialect.string(value);
  if (typeof value === "boolean") return dialect.boolean(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new TemplateRenderError(tag, name, `${value} is not a finite number`);
    }
    return dialect.number(value);
  }
  if (Number.isNaN(value.getTime())) {
    throw new TemplateRenderError(tag, name, "invalid date");
  }
  return dialect.date(value);
}

/**
 * Load the templates of `tags` from `directory`.
 * @throws TemplateLoadError naming every missing file
 */
export function loadTemplates(
  directory: string,
  tags: readonly OperationTag[],
  extension: string
): TemplateStore {
  const dir = path.resolve(directory);
  const templates = new Map<OperationTag, string>();
  const missing: string[] = [];

  for (const tag of tags) {
    const file = path.join(dir, templateFileName(tag, extension));
    if (!fs.existsSync(file)) {
      missing.push(path.basename(file));
      continue;
    }
    templates.set(tag, fs.readFileSync(file, "utf-8").trim());
  }

  if (missing.length > 0) {
    throw new TemplateLoadError(dir, missing);
  }

  return new TemplateStore(dir, extension, templates);
}
