import { describe, expect, it } from 'vitest';
import { CultureKey } from './culture-key.js';
import { DuplicateKeyError, ImmutableResourceError, InvalidKeyError } from './errors.js';
import { InMemoryResourceLanguage } from './resource-language.js';
import { ResourceEntity } from './resource-entity.js';

const neutral = CultureKey.neutral;
const de = CultureKey.parse('de');

function createEntity(name = 'Strings') {
  const neutralLanguage = new InMemoryResourceLanguage(neutral, {
    title: { value: 'Title' },
    greeting: { value: 'Hello {0}' },
  });
  const german = new InMemoryResourceLanguage(de, {
    greeting: { value: 'Hallo {0}' },
    legacy: { value: 'Nur auf Deutsch' },
  });
  const entity = new ResourceEntity(name, [neutralLanguage, german]);
  return { entity, neutralLanguage, german };
}

describe('ResourceEntity', () => {
  it('creates one entry per key found in any culture, neutral keys first', () => {
    const { entity } = createEntity();
    expect(entity.entries.map((entry) => entry.key)).toEqual(['title', 'greeting', 'legacy']);
    expect(entity.getEntry('legacy')?.values.get(neutral)).toBeUndefined();
    expect(entity.getEntry('legacy')?.values.get(de)).toBe('Nur auf Deutsch');
  });

  it('validates its languages', () => {
    expect(() => new ResourceEntity('Strings', [])).toThrow('Resource entity "Strings" needs at least one culture language');
    expect(
      () =>
        new ResourceEntity('Strings', [
          new InMemoryResourceLanguage(neutral),
          new InMemoryResourceLanguage(de),
          new InMemoryResourceLanguage(CultureKey.parse('DE')),
        ])
    ).toThrow('Resource entity "Strings" lists culture "DE" twice');
  });

  it('keeps its key index current when an entry is renamed', () => {
    const { entity } = createEntity();
    const entry = entity.getEntry('greeting');
    entry?.setKey('welcome');

    expect(entity.getEntry('welcome')).toBe(entry);
    expect(entity.hasKey('greeting')).toBe(false);
    expect(entity.entries.map((candidate) => candidate.key)).toEqual(['title', 'welcome', 'legacy']);
  });

  it('scopes duplicate detection to every culture of the entity', () => {
    const { entity } = createEntity();
    expect(() => entity.getEntry('title')?.setKey('legacy')).toThrow(DuplicateKeyError);
    expect(entity.getEntry('title')?.key).toBe('title');
  });

  it('adds entries seeded in the neutral culture', () => {
    const { entity, neutralLanguage, german } = createEntity();
    const entry = entity.addEntry('farewell', 'Goodbye');

    expect(entry.key).toBe('farewell');
    expect(neutralLanguage.getValue('farewell')).toBe('Goodbye');
    expect(german.keyExists('farewell')).toBe(false);
    expect(entity.getEntry('farewell')).toBe(entry);

    expect(() => entity.addEntry('legacy')).toThrow(DuplicateKeyError);
    expect(() => entity.addEntry('')).toThrow(InvalidKeyError);
  });

  it('refuses to add entries when the neutral culture is read-only', () => {
    const { entity, neutralLanguage } = createEntity();
    neutralLanguage.setReadOnly(true);
    expect(() => entity.addEntry('farewell')).toThrow(ImmutableResourceError);
    expect(entity.hasKey('farewell')).toBe(false);
  });

  it('removes a key from every culture', () => {
    const { entity, neutralLanguage, german } = createEntity();
    expect(entity.removeEntry('greeting')).toBe(true);
    expect(neutralLanguage.keyExists('greeting')).toBe(false);
    expect(german.keyExists('greeting')).toBe(false);
    expect(entity.hasKey('greeting')).toBe(false);
    expect(entity.removeEntry('greeting')).toBe(false);
  });

  it('keeps the key when a culture holding it is read-only', () => {
    const { entity, neutralLanguage, german } = createEntity();
    german.setReadOnly(true);
    expect(() => entity.removeEntry('greeting')).toThrow(ImmutableResourceError);
    expect(neutralLanguage.keyExists('greeting')).toBe(true);
    expect(entity.removeEntry('title')).toBe(true);
  });

  it('synchronizes entries with keys changed outside the entity', () => {
    const { entity, neutralLanguage, german } = createEntity();
    neutralLanguage.setValue('added', 'New');
    german.removeKey('legacy');

    expect(entity.synchronize()).toEqual({ added: ['added'], removed: ['legacy'] });
    expect(entity.entries.map((entry) => entry.key)).toEqual(['title', 'greeting', 'added']);
  });

  it('answers canEdit per culture', () => {
    const { entity, german } = createEntity();
    german.setReadOnly(true);
    expect(entity.canEdit(neutral)).toBe(true);
    expect(entity.canEdit(de)).toBe(false);
    expect(entity.canEdit(CultureKey.parse('fr'))).toBe(false);
    expect(entity.getEntry('title')?.canEdit(de)).toBe(false);
  });

  it('treats entities with the same name as equal', () => {
    const first = createEntity('Strings').entity;
    const second = createEntity('Strings').entity;
    const other = createEntity('Errors').entity;

    expect(first.equals(second)).toBe(true);
    expect(first.hashCode()).toBe(second.hashCode());
    expect(first.equals(other)).toBe(false);
    expect(first.getEntry('title')?.equals(second.getEntry('title'))).toBe(true);
  });
});
