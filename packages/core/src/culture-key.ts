const CULTURE_TAG_PATTERN = /^[A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,8})*$/;

/**
 * Identity of one culture inside a resource entity.
 *
 * The neutral culture has an empty name; it is the baseline every other culture
 * is compared against. Instances compare by name, never by reference.
 */
export class CultureKey {
  public static readonly neutral = new CultureKey('');

  private constructor(public readonly name: string) {}

  /**
   * Parse a culture tag such as `de` or `pt-BR`. Empty input yields the neutral key.
   */
  public static parse(name: string | null | undefined): CultureKey {
    const trimmed = name?.trim() ?? '';
    if (!trimmed) {
      return CultureKey.neutral;
    }
    if (!CULTURE_TAG_PATTERN.test(trimmed)) {
      throw new Error(`Invalid culture tag: "${trimmed}"`);
    }
    return new CultureKey(trimmed);
  }

  public static isValidTag(name: string): boolean {
    return CULTURE_TAG_PATTERN.test(name);
  }

  public get isNeutral(): boolean {
    return this.name === '';
  }

  /** Lookup key used by maps; tags compare case-insensitively. */
  public get id(): string {
    return this.name.toLowerCase();
  }

  public equals(other: CultureKey | null | undefined): boolean {
    return Boolean(other) && other?.id === this.id;
  }

  public toString(): string {
    return this.isNeutral ? 'neutral' : this.name;
  }
}
