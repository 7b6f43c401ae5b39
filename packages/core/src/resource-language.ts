import { CultureKey } from './culture-key.js';
import { DuplicateKeyError, ImmutableResourceError, InvalidKeyError } from './errors.js';

/**
 * Storage of values and comments for one culture.
 *
 * A single language instance serves every key of its entity, so entries hold it
 * as a shared reference and never assume exclusive access.
 */
export interface ResourceLanguage {
  readonly culture: CultureKey;
  isNeutralLanguage: boolean;
  getValue(key: string): string | undefined;
  /** Returns whether the stored value changed. `undefined` clears the value. */
  setValue(key: string, value: string | undefined): boolean;
  getComment(key: string): string | undefined;
  /** Returns whether the stored comment changed. `undefined` clears the comment. */
  setComment(key: string, value: string | undefined): boolean;
  keyExists(key: string): boolean;
  canChange(): boolean;
  renameKey(oldKey: string, newKey: string): void;
  removeKey(key: string): boolean;
  keys(): string[];
}

export interface ResourceNode {
  value?: string;
  comment?: string;
}

export interface ResourceLanguageChanges {
  added: string[];
  updated: string[];
  removed: string[];
}

export interface InMemoryResourceLanguageOptions {
  readOnly?: boolean;
}

function sameNode(left: ResourceNode, right: ResourceNode): boolean {
  return left.value === right.value && left.comment === right.comment;
}

function copyEntry([key, node]: [string, ResourceNode]): [string, ResourceNode] {
  return [key, { ...node }];
}

export class InMemoryResourceLanguage implements ResourceLanguage {
  public isNeutralLanguage = false;

  private readonly nodes = new Map<string, ResourceNode>();
  /** Content as of construction or the last `markClean`; changes are measured against it. */
  private baseline = new Map<string, ResourceNode>();
  private readOnly: boolean;

  constructor(
    public readonly culture: CultureKey,
    initial: Record<string, ResourceNode> = {},
    options: InMemoryResourceLanguageOptions = {}
  ) {
    for (const [key, node] of Object.entries(initial)) {
      this.nodes.set(key, { ...node });
    }
    this.readOnly = options.readOnly ?? false;
    this.markClean();
  }

  public get dirty(): boolean {
    if (this.nodes.size !== this.baseline.size) {
      return true;
    }
    for (const [key, node] of this.nodes) {
      const original = this.baseline.get(key);
      if (!original || !sameNode(original, node)) {
        return true;
      }
    }
    return false;
  }

  public setReadOnly(readOnly: boolean): void {
    this.readOnly = readOnly;
  }

  public getValue(key: string): string | undefined {
    return this.nodes.get(key)?.value;
  }

  public setValue(key: string, value: string | undefined): boolean {
    return this.update(key, 'value', value);
  }

  public getComment(key: string): string | undefined {
    return this.nodes.get(key)?.comment;
  }

  public setComment(key: string, value: string | undefined): boolean {
    return this.update(key, 'comment', value);
  }

  public keyExists(key: string): boolean {
    return this.nodes.has(key);
  }

  public canChange(): boolean {
    return !this.readOnly;
  }

  public renameKey(oldKey: string, newKey: string): void {
    if (oldKey === newKey) {
      return;
    }
    if (!newKey) {
      throw new InvalidKeyError();
    }
    this.assertWritable();

    const node = this.nodes.get(oldKey);
    if (!node) {
      return;
    }
    if (this.nodes.has(newKey)) {
      throw new DuplicateKeyError(newKey);
    }

    this.nodes.delete(oldKey);
    this.nodes.set(newKey, node);
  }

  public removeKey(key: string): boolean {
    if (!this.nodes.has(key)) {
      return false;
    }
    this.assertWritable();

    this.nodes.delete(key);
    return true;
  }

  public keys(): string[] {
    return Array.from(this.nodes.keys());
  }

  public snapshot(): Record<string, ResourceNode> {
    // fromEntries defines own properties, so keys such as "__proto__" survive
    return Object.fromEntries(Array.from(this.nodes, copyEntry));
  }

  /**
   * Differences from the last `markClean`, sorted for stable output.
   * A change that was reverted (including a rename renamed back) no longer shows up.
   */
  public changes(): ResourceLanguageChanges {
    const added: string[] = [];
    const updated: string[] = [];
    const removed: string[] = [];

    for (const [key, node] of this.nodes) {
      const original = this.baseline.get(key);
      if (!original) {
        added.push(key);
      } else if (!sameNode(original, node)) {
        updated.push(key);
      }
    }
    for (const key of this.baseline.keys()) {
      if (!this.nodes.has(key)) {
        removed.push(key);
      }
    }

    return { added: added.sort(), updated: updated.sort(), removed: removed.sort() };
  }

  public markClean(): void {
    this.baseline = new Map(Array.from(this.nodes, copyEntry));
  }

  private update(key: string, field: keyof ResourceNode, value: string | undefined): boolean {
    const existing = this.nodes.get(key);
    if (existing?.[field] === value) {
      return false;
    }
    this.assertWritable();

    if (!existing) {
      const node: ResourceNode = {};
      node[field] = value;
      this.nodes.set(key, node);
      return true;
    }

    if (typeof value === 'undefined') {
      delete existing[field];
    } else {
      existing[field] = value;
    }
    return true;
  }

  private assertWritable(): void {
    if (this.readOnly) {
      throw new ImmutableResourceError([this.culture.toString()]);
    }
  }
}
