import { ChangeNotifier, type ChangeListener } from './change-notifier.js';
import { CultureKey } from './culture-key.js';
import { CultureNotFoundError } from './errors.js';
import type { ResourceLanguage } from './resource-language.js';

export type ProjectionGetter<T> = (language: ResourceLanguage) => T;
export type ProjectionSetter<T> = (language: ResourceLanguage, value: T) => boolean;

export interface ValueChangedEvent<T> {
  culture: CultureKey;
  value: T;
}

/**
 * One attribute (value, comment, ...) of a resource key, projected across every culture.
 *
 * The getter and setter usually close over a resource key, so a projection is
 * replaced rather than patched when that key changes.
 */
export class ValueProjection<T> implements Iterable<[CultureKey, T]> {
  private readonly languagesById = new Map<string, ResourceLanguage>();
  private readonly notifier = new ChangeNotifier<ValueChangedEvent<T>>();

  constructor(
    languages: readonly ResourceLanguage[],
    private readonly getter: ProjectionGetter<T>,
    private readonly setter: ProjectionSetter<T>
  ) {
    for (const language of languages) {
      this.languagesById.set(language.culture.id, language);
    }
  }

  public get cultures(): CultureKey[] {
    return Array.from(this.languagesById.values(), (language) => language.culture);
  }

  public has(culture: CultureKey): boolean {
    return this.languagesById.has(culture.id);
  }

  /**
   * @throws CultureNotFoundError when the culture is not part of the projection.
   */
  public get(culture: CultureKey): T {
    return this.getter(this.resolve(culture));
  }

  /**
   * Writes through to the culture's language. `ValueChanged` fires once, and only
   * when the language reports an actual change.
   */
  public set(culture: CultureKey, value: T): boolean {
    const changed = this.setter(this.resolve(culture), value);
    if (changed) {
      this.notifier.emit({ culture, value });
    }
    return changed;
  }

  public onValueChanged(listener: ChangeListener<ValueChangedEvent<T>>): () => void {
    return this.notifier.subscribe(listener);
  }

  /** Drops every listener; used when the owner replaces this projection. */
  public detach(): void {
    this.notifier.clear();
  }

  public toRecord(): Record<string, T> {
    const record: Record<string, T> = {};
    for (const [culture, value] of this) {
      record[culture.name] = value;
    }
    return record;
  }

  public *[Symbol.iterator](): Iterator<[CultureKey, T]> {
    for (const language of this.languagesById.values()) {
      yield [language.culture, this.getter(language)];
    }
  }

  private resolve(culture: CultureKey): ResourceLanguage {
    const language = this.languagesById.get(culture.id);
    if (!language) {
      throw new CultureNotFoundError(culture.toString());
    }
    return language;
  }
}
