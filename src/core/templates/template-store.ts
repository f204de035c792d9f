/**
 * Template Store
 *
 * Named, reusable SearchCriteria. Every operation runs under one async mutex,
 * so a read never observes a half-applied write. When a file path is given
 * each change is written through to `{schemaVersion, templates}` JSON.
 *
 * @module
 */

import type { SearchCriteria, SearchCriteriaInput, SearchTemplate } from "../../types/index.js";
import { Mutex } from "../../utils/async.js";
import { compareStrings, createLogger, readJsonFile, writeJsonAtomic, type Logger } from "../../utils/index.js";
import {
  SearchCriteriaSchema,
  SearchTemplateSchema,
  VersionedFileSchema,
  validate,
  type TemplatesFile,
} from "../../utils/validation.js";
import { SchemaVersionError, TemplateConflictError, TemplateNotFoundError, ValidationError } from "../errors.js";

export const TEMPLATES_SCHEMA_VERSION = 1;

export interface TemplateStoreOptions {
  /** Write-through persistence target; memory only when omitted */
  filePath?: string;
  clock?: () => Date;
  logger?: Logger;
}

export interface CreateTemplateOptions {
  description?: string;
  /** Replace an existing template of the same name instead of failing */
  overwrite?: boolean;
}

export interface TemplateUpdate {
  criteria?: SearchCriteriaInput;
  description?: string;
}

export class TemplateStore {
  private templates = new Map<string, SearchTemplate>();
  private readonly mutex = new Mutex();
  private readonly filePath: string | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: TemplateStoreOptions = {}, initial: Iterable<SearchTemplate> = []) {
    this.filePath = options.filePath;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger("templates");
    for (const template of initial) this.templates.set(template.name, template);
  }

  /**
   * Opens a store backed by a file. A missing file gives an empty store.
   *
   * @throws {SchemaVersionError} When the file needs migrating
   * @throws {ValidationError} When the file does not match the templates schema
   */
  static async open(filePath: string, options: Omit<TemplateStoreOptions, "filePath"> = {}): Promise<TemplateStore> {
    const data = await readJsonFile(filePath);
    if (data === null) {
      return new TemplateStore({ ...options, filePath });
    }

    const versioned = VersionedFileSchema.safeParse(data);
    if (!versioned.success) {
      throw new ValidationError("INVALID_CONFIG", `Template file ${filePath} is not an object`);
    }
    if (versioned.data.schemaVersion !== TEMPLATES_SCHEMA_VERSION) {
      throw new SchemaVersionError("Template store", TEMPLATES_SCHEMA_VERSION, versioned.data.schemaVersion);
    }

    // Entries are validated one by one: a record schema would drop a "__proto__" key
    const entries = versioned.data.templates;
    if (typeof entries !== "object" || entries === null || Array.isArray(entries)) {
      throw new ValidationError("INVALID_CONFIG", `Template file ${filePath} has no templates object`);
    }
    const templates = Object.entries(entries).map(([name, entry]: [string, unknown]) =>
      validate(SearchTemplateSchema, entry, "INVALID_CONFIG", `template "${name}" (${filePath})`)
    );
    return new TemplateStore({ ...options, filePath }, templates);
  }

  /**
   * @throws {TemplateConflictError} When the name is taken and overwrite is not set
   * @throws {ValidationError} When the criteria are invalid
   */
  async create(name: string, criteria: SearchCriteriaInput, options: CreateTemplateOptions = {}): Promise<SearchTemplate> {
    const validated = validateCriteria(criteria);
    const trimmed = validateName(name);

    return this.mutex.runExclusive(async () => {
      if (this.templates.has(trimmed) && !options.overwrite) {
        throw new TemplateConflictError(trimmed);
      }

      const template: SearchTemplate = {
        name: trimmed,
        criteria: validated,
        createdAt: this.clock().toISOString(),
        useCount: 0,
      };
      if (options.description !== undefined) template.description = options.description;

      await this.commit((next) => next.set(trimmed, template));
      this.logger.info({ name: trimmed }, "Template saved");
      return structuredClone(template);
    });
  }

  /**
   * @throws {TemplateNotFoundError}
   */
  async get(name: string): Promise<SearchTemplate> {
    return this.mutex.runExclusive(() => structuredClone(this.require(name)));
  }

  /**
   * @throws {TemplateNotFoundError}
   */
  async update(name: string, update: TemplateUpdate): Promise<SearchTemplate> {
    const criteria = update.criteria === undefined ? undefined : validateCriteria(update.criteria);

    return this.mutex.runExclusive(async () => {
      const existing = this.require(name);
      const next: SearchTemplate = { ...existing };
      if (criteria) next.criteria = criteria;
      if (update.description !== undefined) next.description = update.description;

      await this.commit((templates) => templates.set(existing.name, next));
      return structuredClone(next);
    });
  }

  /**
   * @throws {TemplateNotFoundError}
   */
  async delete(name: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const existing = this.require(name);
      await this.commit((templates) => templates.delete(existing.name));
      this.logger.info({ name: existing.name }, "Template deleted");
    });
  }

  /**
   * Template names in code-unit order
   */
  async list(): Promise<string[]> {
    return this.mutex.runExclusive(() => [...this.templates.keys()].sort(compareStrings));
  }

  /**
   * Records a use and returns the template's criteria
   *
   * @throws {TemplateNotFoundError}
   */
  async markUsed(name: string): Promise<SearchCriteria> {
    return this.mutex.runExclusive(async () => {
      const existing = this.require(name);
      const next: SearchTemplate = {
        ...existing,
        lastUsedAt: this.clock().toISOString(),
        useCount: existing.useCount + 1,
      };
      await this.commit((templates) => templates.set(existing.name, next));
      return structuredClone(next.criteria);
    });
  }

  get size(): number {
    return this.templates.size;
  }

  toJSON(): TemplatesFile {
    return serialize(this.templates);
  }

  private require(name: string): SearchTemplate {
    const template = this.templates.get(name.trim());
    if (!template) throw new TemplateNotFoundError(name);
    return template;
  }

  /**
   * Applies a change to a copy, writes the copy through, and only then
   * replaces the live map, so a failed write leaves the store unchanged
   */
  private async commit(change: (templates: Map<string, SearchTemplate>) => void): Promise<void> {
    const next = new Map(this.templates);
    change(next);
    if (this.filePath) await writeJsonAtomic(this.filePath, serialize(next));
    this.templates = next;
  }
}

function serialize(templates: ReadonlyMap<string, SearchTemplate>): TemplatesFile {
  // fromEntries defines own keys, so a name such as "__proto__" is kept
  const entries = [...templates].sort(([a], [b]) => compareStrings(a, b));
  return { schemaVersion: TEMPLATES_SCHEMA_VERSION, templates: Object.fromEntries(entries) };
}

function validateCriteria(criteria: SearchCriteriaInput): SearchCriteria {
  return validate(SearchCriteriaSchema, criteria, "INVALID_CRITERIA", "search criteria");
}

function validateName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === "") {
    throw new ValidationError("INVALID_CRITERIA", "Template name must not be empty");
  }
  return trimmed;
}
