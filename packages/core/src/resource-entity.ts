import type { CultureKey } from './culture-key.js';
import { debugLog } from './debug.js';
import { DuplicateKeyError, ImmutableResourceError, InvalidKeyError } from './errors.js';
import { hashString } from './hash.js';
import { ResourceEntry, type ResourceEntryOwner } from './resource-entry.js';
import type { ResourceLanguage } from './resource-language.js';

export interface EntitySyncSummary {
  added: string[];
  removed: string[];
}

/**
 * A named group of culture languages (one per culture) and the entries for every
 * key found in any of them.
 *
 * The entity is the only writer of its culture set and the only place entries are
 * created or discarded.
 */
export class ResourceEntity implements ResourceEntryOwner {
  private readonly orderedLanguages: readonly ResourceLanguage[];
  private readonly languagesById = new Map<string, ResourceLanguage>();
  private entryList: ResourceEntry[] = [];
  private readonly entriesByKey = new Map<string, ResourceEntry>();

  /**
   * @param languages - One language per culture; the first one is the neutral language.
   */
  constructor(public readonly name: string, languages: readonly ResourceLanguage[]) {
    if (!name.trim()) {
      throw new Error('Resource entity name must not be empty');
    }
    if (!languages.length) {
      throw new Error(`Resource entity "${name}" needs at least one culture language`);
    }

    for (const language of languages) {
      if (this.languagesById.has(language.culture.id)) {
        throw new Error(`Resource entity "${name}" lists culture "${language.culture}" twice`);
      }
      this.languagesById.set(language.culture.id, language);
    }
    this.orderedLanguages = [...languages];

    this.synchronize();
  }

  public get languages(): readonly ResourceLanguage[] {
    return this.orderedLanguages;
  }

  public get neutralLanguage(): ResourceLanguage {
    return this.orderedLanguages[0];
  }

  public get cultures(): CultureKey[] {
    return this.orderedLanguages.map((language) => language.culture);
  }

  public get neutralCulture(): CultureKey {
    return this.neutralLanguage.culture;
  }

  public get entries(): readonly ResourceEntry[] {
    return this.entryList;
  }

  public languageFor(culture: CultureKey): ResourceLanguage | undefined {
    return this.languagesById.get(culture.id);
  }

  public getEntry(key: string): ResourceEntry | undefined {
    return this.entriesByKey.get(key);
  }

  public hasKey(key: string): boolean {
    return this.entriesByKey.has(key);
  }

  public canEdit(culture: CultureKey): boolean {
    return this.languageFor(culture)?.canChange() ?? false;
  }

  /**
   * Create a new key, seeded in the neutral language.
   */
  public addEntry(key: string, neutralValue = ''): ResourceEntry {
    if (!key) {
      throw new InvalidKeyError();
    }
    if (this.entriesByKey.has(key) || this.orderedLanguages.some((language) => language.keyExists(key))) {
      throw new DuplicateKeyError(key);
    }
    if (!this.neutralLanguage.canChange()) {
      throw new ImmutableResourceError([this.neutralCulture.toString()]);
    }

    this.neutralLanguage.setValue(key, neutralValue);
    return this.track(key);
  }

  /**
   * Delete a key from every culture and discard its entry.
   * Returns false when the key is unknown.
   */
  public removeEntry(key: string): boolean {
    const entry = this.entriesByKey.get(key);
    if (!entry) {
      return false;
    }

    const holders = this.orderedLanguages.filter((language) => language.keyExists(key));
    const locked = holders.filter((language) => !language.canChange());
    if (locked.length) {
      throw new ImmutableResourceError(locked.map((language) => language.culture.toString()));
    }

    for (const language of holders) {
      language.removeKey(key);
    }

    this.entryList = this.entryList.filter((candidate) => candidate !== entry);
    this.entriesByKey.delete(key);
    return true;
  }

  /**
   * Align entries with the keys currently stored in the languages, e.g. after
   * they were edited outside of this entity.
   */
  public synchronize(): EntitySyncSummary {
    const present = new Set<string>();
    const added: string[] = [];

    for (const language of this.orderedLanguages) {
      for (const key of language.keys()) {
        if (!key || present.has(key)) {
          continue;
        }
        present.add(key);
        if (!this.entriesByKey.has(key)) {
          this.track(key);
          added.push(key);
        }
      }
    }

    const removed = this.entryList.filter((entry) => !present.has(entry.key)).map((entry) => entry.key);
    if (removed.length) {
      this.entryList = this.entryList.filter((entry) => present.has(entry.key));
      for (const key of removed) {
        this.entriesByKey.delete(key);
      }
    }

    if (added.length || removed.length) {
      debugLog('entity', `${this.name}: ${added.length} added, ${removed.length} removed`);
    }

    return { added, removed };
  }

  public equals(other: ResourceEntryOwner): boolean {
    return this === other || (other instanceof ResourceEntity && other.name === this.name);
  }

  public hashCode(): number {
    return hashString(this.name);
  }

  private track(key: string): ResourceEntry {
    const entry = new ResourceEntry(this, key, this.orderedLanguages);
    entry.onPropertyChanged(({ property }) => {
      if (property === 'key') {
        this.reindex();
      }
    });
    this.entryList.push(entry);
    this.entriesByKey.set(key, entry);
    return entry;
  }

  private reindex(): void {
    this.entriesByKey.clear();
    for (const entry of this.entryList) {
      this.entriesByKey.set(entry.key, entry);
    }
  }
}
