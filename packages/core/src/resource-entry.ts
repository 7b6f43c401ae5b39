import { ChangeNotifier, type ChangeListener } from './change-notifier.js';
import type { CultureKey } from './culture-key.js';
import { debugLog } from './debug.js';
import { DuplicateKeyError, ImmutableResourceError, InvalidKeyError } from './errors.js';
import {
  FORMAT_PARAMETER_MISMATCH_ERROR,
  getFormatParameterSignature,
  hasFormatParameterMismatches,
} from './format-parameters.js';
import { combineHashes, hashString } from './hash.js';
import type { ResourceLanguage } from './resource-language.js';
import { ValueProjection } from './value-projection.js';

export const INVARIANT_MARKER = '@Invariant';

const INVARIANT_MARKER_PATTERN = /@invariant/gi;
const INVARIANT_MARKER_TEST = /@invariant/i;

/**
 * Location of a key usage in source code. Supplied by an external scanner;
 * the entry stores the list as given and never interprets it.
 */
export interface CodeReference {
  projectFile: string;
  lineNumber: number;
  lineSegments: readonly string[];
}

/**
 * The entity an entry belongs to. Entries compare equal only within the same owner.
 */
export interface ResourceEntryOwner {
  readonly name: string;
  equals(other: ResourceEntryOwner): boolean;
  hashCode(): number;
  canEdit(culture: CultureKey): boolean;
}

export type ResourceEntryProperty =
  | 'key'
  | 'values'
  | 'comment'
  | 'comments'
  | 'codeReferences'
  | 'fileExists'
  | 'errors'
  | 'isInvariant'
  | 'hasFormatParameterMismatch';

export interface PropertyChangedEvent {
  entry: ResourceEntry;
  property: ResourceEntryProperty;
}

/**
 * Derived properties that must be recomputed when a property changes.
 * Expanded transitively; every property is raised at most once per change.
 */
const PROPERTY_DEPENDENTS: Record<ResourceEntryProperty, readonly ResourceEntryProperty[]> = {
  key: ['values', 'comment'],
  values: ['fileExists', 'errors', 'hasFormatParameterMismatch'],
  comment: ['comments', 'isInvariant'],
  comments: [],
  codeReferences: [],
  fileExists: [],
  errors: [],
  isInvariant: ['hasFormatParameterMismatch'],
  hasFormatParameterMismatch: [],
};

export function expandPropertyChange(property: ResourceEntryProperty): ResourceEntryProperty[] {
  const ordered: ResourceEntryProperty[] = [];
  const queue: ResourceEntryProperty[] = [property];
  const seen = new Set<ResourceEntryProperty>();

  while (queue.length) {
    const next = queue.shift();
    if (!next || seen.has(next)) {
      continue;
    }
    seen.add(next);
    ordered.push(next);
    queue.push(...PROPERTY_DEPENDENTS[next]);
  }

  return ordered;
}

export interface ResourceEntryEqualityComparer {
  equals(left: ResourceEntry | null | undefined, right: ResourceEntry | null | undefined): boolean;
  hashCode(entry: ResourceEntry): number;
}

/**
 * One resource key across all cultures of its entity.
 *
 * Values and comments live in the shared culture languages; the entry only binds
 * them to its key and derives validation state on demand.
 */
export class ResourceEntry {
  public static readonly equalityComparer: ResourceEntryEqualityComparer = {
    equals(left, right) {
      if (left === right) {
        return true;
      }
      if (!left || !right) {
        return false;
      }
      return left.equals(right);
    },
    hashCode(entry) {
      return entry.hashCode();
    },
  };

  public readonly neutralLanguage: ResourceLanguage;

  private readonly cultureLanguages: readonly ResourceLanguage[];
  private readonly notifier = new ChangeNotifier<PropertyChangedEvent>();
  private readonly fileExistsProjection: ValueProjection<boolean>;
  private readonly errorsProjection: ValueProjection<string | undefined>;
  private currentKey: string;
  private valuesProjection: ValueProjection<string | undefined>;
  private commentsProjection: ValueProjection<string | undefined>;
  private references: readonly CodeReference[] | undefined;

  /**
   * @param languages - Ordered culture languages; the first one is the neutral language.
   */
  constructor(
    public readonly owner: ResourceEntryOwner,
    key: string,
    languages: readonly ResourceLanguage[]
  ) {
    if (!key) {
      throw new InvalidKeyError();
    }
    const [neutralLanguage] = languages;
    if (!neutralLanguage) {
      throw new Error(`Resource entry "${key}" needs at least one culture language`);
    }

    this.currentKey = key;
    this.cultureLanguages = [...languages];
    this.neutralLanguage = neutralLanguage;
    this.neutralLanguage.isNeutralLanguage = true;

    this.valuesProjection = this.createValuesProjection();
    this.commentsProjection = this.createCommentsProjection();
    this.fileExistsProjection = new ValueProjection(this.cultureLanguages, () => true, () => false);
    this.errorsProjection = new ValueProjection(
      this.cultureLanguages,
      (language) => this.getError(language),
      () => false
    );
  }

  public get key(): string {
    return this.currentKey;
  }

  /**
   * Rename the key in every culture language.
   *
   * Collision and immutability are checked across all languages before anything
   * is renamed, so the rename is applied everywhere or nowhere.
   *
   * A rejected rename still raises a `key` change before throwing, so bound views
   * re-read the key and discover it is unchanged. A `key` notification therefore
   * does not mean the rename succeeded; callers must rely on the thrown error.
   *
   * @throws InvalidKeyError when `newKey` is empty.
   * @throws DuplicateKeyError when any culture already holds `newKey`.
   * @throws ImmutableResourceError when any culture refuses changes.
   */
  public setKey(newKey: string): void {
    if (!newKey) {
      throw new InvalidKeyError();
    }
    if (newKey === this.currentKey) {
      return;
    }

    const oldKey = this.currentKey;
    const duplicate = this.cultureLanguages.some((language) => language.keyExists(newKey));
    const locked = this.cultureLanguages.filter((language) => !language.canChange());

    if (duplicate || locked.length) {
      debugLog('entry', `rename "${oldKey}" -> "${newKey}" rejected (${duplicate ? 'duplicate' : 'immutable'})`);
      this.raise('key');
      if (duplicate) {
        throw new DuplicateKeyError(newKey);
      }
      throw new ImmutableResourceError(locked.map((language) => language.culture.toString()));
    }

    const renamed: ResourceLanguage[] = [];
    try {
      for (const language of this.cultureLanguages) {
        language.renameKey(oldKey, newKey);
        renamed.push(language);
      }
    } catch (error) {
      for (const language of renamed.reverse()) {
        language.renameKey(newKey, oldKey);
      }
      throw error;
    }

    this.currentKey = newKey;
    this.resetProjections();
    this.notify('key');
  }

  /**
   * Comment of the neutral language; empty when none is set.
   */
  public get comment(): string {
    return this.neutralLanguage.getComment(this.currentKey) ?? '';
  }

  public set comment(value: string) {
    if (this.neutralLanguage.setComment(this.currentKey, value)) {
      this.notify('comment');
    }
  }

  public get values(): ValueProjection<string | undefined> {
    return this.valuesProjection;
  }

  public get comments(): ValueProjection<string | undefined> {
    return this.commentsProjection;
  }

  public get fileExists(): ValueProjection<boolean> {
    return this.fileExistsProjection;
  }

  /** Per-culture error text; `undefined` when the culture has no finding. */
  public get errors(): ValueProjection<string | undefined> {
    return this.errorsProjection;
  }

  public get isInvariant(): boolean {
    return INVARIANT_MARKER_TEST.test(this.comment);
  }

  /**
   * Setting `true` appends the marker when absent; setting `false` strips every
   * occurrence, whatever its casing.
   */
  public set isInvariant(value: boolean) {
    if (value) {
      if (!this.isInvariant) {
        this.comment = this.comment + INVARIANT_MARKER;
      }
      return;
    }

    const original = this.comment;
    let comment = original;
    // Removing one marker can join its neighbours into a new one.
    while (INVARIANT_MARKER_TEST.test(comment)) {
      comment = comment.replace(INVARIANT_MARKER_PATTERN, '');
    }
    if (comment !== original) {
      this.comment = comment;
    }
  }

  /**
   * True when the non-empty values of all cultures disagree on their format parameters.
   * Invariant entries never report a mismatch.
   */
  public get hasFormatParameterMismatch(): boolean {
    if (this.isInvariant) {
      return false;
    }
    return hasFormatParameterMismatches(Array.from(this.valuesProjection, ([, value]) => value));
  }

  /**
   * Same comparison as `hasFormatParameterMismatch`, restricted to the given cultures.
   * The invariant marker is not consulted here.
   */
  public hasFormatParameterMismatchIn(cultures: Iterable<CultureKey>): boolean {
    return hasFormatParameterMismatches(Array.from(cultures, (culture) => this.valuesProjection.get(culture)));
  }

  public get codeReferences(): readonly CodeReference[] | undefined {
    return this.references;
  }

  /** Replaces the whole list; contents are never merged. */
  public set codeReferences(references: readonly CodeReference[] | undefined) {
    if (this.references === references) {
      return;
    }
    this.references = references;
    this.notify('codeReferences');
  }

  public get languages(): readonly ResourceLanguage[] {
    return this.cultureLanguages;
  }

  public get cultures(): CultureKey[] {
    return this.cultureLanguages.map((language) => language.culture);
  }

  public get neutralCulture(): CultureKey {
    return this.neutralLanguage.culture;
  }

  public canEdit(culture: CultureKey): boolean {
    return this.owner.canEdit(culture);
  }

  /**
   * Re-announce values and comment, e.g. after the languages were reloaded from storage.
   */
  public refresh(): void {
    this.notify('values');
    this.notify('comment');
  }

  /**
   * Listen for property changes. Events only say what to recompute; read the new state from the entry.
   */
  public onPropertyChanged(listener: ChangeListener<PropertyChangedEvent>): () => void {
    return this.notifier.subscribe(listener);
  }

  public equals(other: ResourceEntry | null | undefined): boolean {
    if (!other) {
      return false;
    }
    if (other === this) {
      return true;
    }
    return this.owner.equals(other.owner) && this.currentKey === other.currentKey;
  }

  public hashCode(): number {
    return combineHashes(this.owner.hashCode(), hashString(this.currentKey));
  }

  public toString(): string {
    return `${this.owner.name}:${this.currentKey}`;
  }

  private getError(language: ResourceLanguage): string | undefined {
    if (language === this.neutralLanguage) {
      return undefined;
    }

    const value = language.getValue(this.currentKey);
    if (!value) {
      return undefined;
    }

    const neutralValue = this.neutralLanguage.getValue(this.currentKey);
    if (!neutralValue) {
      return undefined;
    }

    if (getFormatParameterSignature(neutralValue) !== getFormatParameterSignature(value)) {
      return FORMAT_PARAMETER_MISMATCH_ERROR;
    }

    return undefined;
  }

  private createValuesProjection(): ValueProjection<string | undefined> {
    const key = this.currentKey;
    const projection = new ValueProjection<string | undefined>(
      this.cultureLanguages,
      (language) => language.getValue(key),
      (language, value) => language.setValue(key, value)
    );
    projection.onValueChanged(() => this.notify('values'));
    return projection;
  }

  private createCommentsProjection(): ValueProjection<string | undefined> {
    const key = this.currentKey;
    const projection = new ValueProjection<string | undefined>(
      this.cultureLanguages,
      (language) => language.getComment(key),
      (language, value) => language.setComment(key, value)
    );
    projection.onValueChanged(() => this.notify('comment'));
    return projection;
  }

  private resetProjections(): void {
    this.valuesProjection.detach();
    this.valuesProjection = this.createValuesProjection();

    this.commentsProjection.detach();
    this.commentsProjection = this.createCommentsProjection();
  }

  private notify(property: ResourceEntryProperty): void {
    for (const affected of expandPropertyChange(property)) {
      this.raise(affected);
    }
  }

  private raise(property: ResourceEntryProperty): void {
    this.notifier.emit({ entry: this, property });
  }
}
