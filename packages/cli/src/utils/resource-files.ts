import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import crypto from 'crypto';
import {
  CultureKey,
  InMemoryResourceLanguage,
  ResourceEntity,
  type ResourceNode,
} from '@culturegrid/core';

const RESOURCE_EXTENSION = '.json';

export interface ResourceFileRef {
  culture: CultureKey;
  path: string;
}

export interface ResourceFileSet {
  name: string;
  files: ResourceFileRef[];
}

export interface ResourceFileStats {
  entity: string;
  culture: string;
  path: string;
  totalKeys: number;
  added: string[];
  updated: string[];
  removed: string[];
}

export interface ResourceFileStoreOptions {
  /** Culture tags whose files are loaded read-only. The neutral files use `neutralCulture`. */
  readOnlyCultures?: string[];
  /** Tag standing for the neutral files in `readOnlyCultures` and reports. */
  neutralCulture?: string;
  /** Preferred culture order after the neutral one; unlisted cultures follow alphabetically. */
  cultureOrder?: string[];
}

interface TrackedLanguage {
  entity: string;
  path: string;
  language: InMemoryResourceLanguage;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split `Strings.de.json` into entity `Strings` and culture `de`.
 * A file without a culture suffix holds the neutral culture.
 */
export function parseResourceFileName(fileName: string): { name: string; culture: CultureKey } | null {
  if (!fileName.endsWith(RESOURCE_EXTENSION)) {
    return null;
  }

  const base = fileName.slice(0, -RESOURCE_EXTENSION.length);
  if (!base) {
    return null;
  }

  const separator = base.lastIndexOf('.');
  if (separator > 0) {
    const suffix = base.slice(separator + 1);
    if (CultureKey.isValidTag(suffix)) {
      return { name: base.slice(0, separator), culture: CultureKey.parse(suffix) };
    }
  }

  return { name: base, culture: CultureKey.neutral };
}

export function resourceFileName(name: string, culture: CultureKey): string {
  return culture.isNeutral ? `${name}${RESOURCE_EXTENSION}` : `${name}.${culture.name}${RESOURCE_EXTENSION}`;
}

/**
 * Accepts `{ "key": "value" }` and `{ "key": { "value"?: "...", "comment"?: "..." } }`.
 * Entries of any other shape are reported and skipped.
 */
export function parseResourceDocument(
  input: unknown,
  source: string
): { nodes: Record<string, ResourceNode>; warnings: string[] } {
  const entries: Array<[string, ResourceNode]> = [];
  const warnings: string[] = [];

  if (!isRecord(input)) {
    warnings.push(`${source}: expected a JSON object at the top level`);
    return { nodes: {}, warnings };
  }

  for (const [key, raw] of Object.entries(input)) {
    if (!key) {
      warnings.push(`${source}: skipped an entry with an empty key`);
      continue;
    }
    if (typeof raw === 'string') {
      entries.push([key, { value: raw }]);
      continue;
    }
    if (isRecord(raw)) {
      const node: ResourceNode = {};
      if (typeof raw.value === 'string') {
        node.value = raw.value;
      }
      if (typeof raw.comment === 'string') {
        node.comment = raw.comment;
      }
      entries.push([key, node]);
      continue;
    }
    warnings.push(`${source}: skipped "${key}" (expected a string or { value, comment })`);
  }

  // fromEntries defines own properties, so a key such as "__proto__" is kept
  return { nodes: Object.fromEntries(entries), warnings };
}

/** The short string form is used only when it reads back as the same node. */
function serializeNode(node: ResourceNode): string | ResourceNode {
  if (typeof node.value === 'string' && typeof node.comment === 'undefined') {
    return node.value;
  }
  const serialized: ResourceNode = {};
  if (typeof node.value === 'string') {
    serialized.value = node.value;
  }
  if (typeof node.comment === 'string') {
    serialized.comment = node.comment;
  }
  return serialized;
}

export function serializeResourceNodes(nodes: Record<string, ResourceNode>): string {
  const sorted = Object.keys(nodes)
    .sort((a, b) => a.localeCompare(b))
    .map((key): [string, string | ResourceNode] => [key, serializeNode(nodes[key])]);
  return `${JSON.stringify(Object.fromEntries(sorted), null, 2)}\n`;
}

/**
 * Loads JSON resource files into entities and writes changed cultures back.
 */
export class ResourceFileStore {
  private readonly tracked: TrackedLanguage[] = [];
  private readonly collectedWarnings: string[] = [];
  private readonly readOnlyCultures: Set<string>;
  private readonly neutralCulture: string;
  private readonly cultureOrder: string[];

  constructor(private readonly resourcesDir: string, options: ResourceFileStoreOptions = {}) {
    this.readOnlyCultures = new Set((options.readOnlyCultures ?? []).map((culture) => culture.toLowerCase()));
    this.neutralCulture = options.neutralCulture ?? 'en';
    this.cultureOrder = (options.cultureOrder ?? []).map((culture) => culture.toLowerCase());
  }

  public get warnings(): readonly string[] {
    return this.collectedWarnings;
  }

  public async discover(): Promise<ResourceFileSet[]> {
    let names: string[];
    try {
      const dirents = await fs.readdir(this.resourcesDir, { withFileTypes: true });
      names = dirents.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        throw new Error(`Resources directory not found: ${this.resourcesDir}`);
      }
      throw error;
    }

    const sets = new Map<string, ResourceFileSet>();
    for (const fileName of names) {
      const parsed = parseResourceFileName(fileName);
      if (!parsed) {
        continue;
      }
      const set = sets.get(parsed.name) ?? { name: parsed.name, files: [] };
      set.files.push({ culture: parsed.culture, path: path.join(this.resourcesDir, fileName) });
      sets.set(parsed.name, set);
    }

    return Array.from(sets.values())
      .map((set) => ({ ...set, files: this.orderFiles(set.name, set.files) }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  public async loadAll(): Promise<ResourceEntity[]> {
    const sets = await this.discover();
    const entities: ResourceEntity[] = [];
    for (const set of sets) {
      entities.push(await this.loadEntity(set));
    }
    return entities;
  }

  public async loadEntity(set: ResourceFileSet): Promise<ResourceEntity> {
    const languages: InMemoryResourceLanguage[] = [];

    for (const file of set.files) {
      const nodes = await this.readNodes(file.path);
      const readOnly = this.isConfiguredReadOnly(file.culture) || !(await this.isWritable(file.path));
      const language = new InMemoryResourceLanguage(file.culture, nodes, { readOnly });
      this.tracked.push({ entity: set.name, path: file.path, language });
      languages.push(language);
    }

    return new ResourceEntity(set.name, languages);
  }

  /**
   * Write every changed culture file atomically (temp file + rename).
   */
  public async flush(): Promise<ResourceFileStats[]> {
    const summaries: ResourceFileStats[] = [];

    for (const entry of this.tracked) {
      if (!entry.language.dirty) {
        continue;
      }

      const snapshot = entry.language.snapshot();
      await fs.mkdir(path.dirname(entry.path), { recursive: true });
      const tempPath = this.createTempPath(entry.path);
      await fs.writeFile(tempPath, serializeResourceNodes(snapshot), 'utf8');

      try {
        await fs.rename(tempPath, entry.path);
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code !== 'EEXIST' && err.code !== 'EPERM') {
          throw error;
        }
        await fs.rm(entry.path, { force: true });
        await fs.rename(tempPath, entry.path);
      } finally {
        await fs.rm(tempPath, { force: true });
      }

      const changes = entry.language.changes();
      entry.language.markClean();

      summaries.push({
        entity: entry.entity,
        culture: this.cultureLabel(entry.language.culture),
        path: entry.path,
        totalKeys: Object.keys(snapshot).length,
        ...changes,
      });
    }

    return summaries;
  }

  public cultureLabel(culture: CultureKey): string {
    return culture.isNeutral ? this.neutralCulture : culture.name;
  }

  private orderFiles(name: string, files: ResourceFileRef[]): ResourceFileRef[] {
    const neutral = files.find((file) => file.culture.isNeutral) ?? {
      culture: CultureKey.neutral,
      path: path.join(this.resourcesDir, resourceFileName(name, CultureKey.neutral)),
    };

    const rank = (culture: CultureKey) => {
      const index = this.cultureOrder.indexOf(culture.id);
      return index === -1 ? Number.MAX_SAFE_INTEGER : index;
    };

    const others = files
      .filter((file) => !file.culture.isNeutral)
      .sort((a, b) => rank(a.culture) - rank(b.culture) || a.culture.id.localeCompare(b.culture.id));

    return [neutral, ...others];
  }

  private async readNodes(filePath: string): Promise<Record<string, ResourceNode>> {
    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Resource file ${filePath} contains invalid JSON: ${message}`);
    }

    const { nodes, warnings } = parseResourceDocument(parsed, path.basename(filePath));
    this.collectedWarnings.push(...warnings);
    return nodes;
  }

  private isConfiguredReadOnly(culture: CultureKey): boolean {
    return this.readOnlyCultures.has(this.cultureLabel(culture).toLowerCase());
  }

  private async isWritable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fsConstants.W_OK);
      return true;
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      // A file that does not exist yet can still be created
      return err.code === 'ENOENT';
    }
  }

  private createTempPath(filePath: string): string {
    const unique = crypto.randomBytes(6).toString('hex');
    return `${filePath}.${unique}.tmp`;
  }
}
