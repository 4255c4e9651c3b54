/**
 * DocumentPath Tests
 */

import { getPath, incrementAt, insertAt, mergeMissing, parsePath, removeFrom, setPath } from '../DocumentPath';
import type { JsonObject } from '../types';

describe('DocumentPath', () => {
  describe('parsePath()', () => {
    it('should split on dots', () => {
      expect(parsePath('inventory.weapons.++')).toEqual(['inventory', 'weapons', '++']);
    });

    it('should reject empty paths and segments', () => {
      expect(parsePath('')).toBeUndefined();
      expect(parsePath('a..b')).toBeUndefined();
      expect(parsePath('a.')).toBeUndefined();
    });

    it('should reject prototype segments', () => {
      expect(parsePath('__proto__.polluted')).toBeUndefined();
      expect(parsePath('a.constructor')).toBeUndefined();
    });
  });

  describe('getPath()', () => {
    const doc: JsonObject = { inventory: { weapons: ['sword', 'bow'] }, coins: 0 };

    it('should resolve nested keys and 1-based positions', () => {
      expect(getPath(doc, 'coins')).toBe(0);
      expect(getPath(doc, 'inventory.weapons.2')).toBe('bow');
    });

    it('should give undefined for missing segments', () => {
      expect(getPath(doc, 'inventory.armor')).toBeUndefined();
      expect(getPath(doc, 'inventory.weapons.3')).toBeUndefined();
      expect(getPath(doc, 'inventory.weapons.0')).toBeUndefined();
      expect(getPath(doc, 'coins.value')).toBeUndefined();
      expect(getPath(doc, 'toString')).toBeUndefined();
    });
  });

  describe('setPath()', () => {
    it('should append with ++', () => {
      const doc: JsonObject = { inventory: { weapons: [] } };

      expect(setPath(doc, 'inventory.weapons.++', 'sword')).toBe(true);
      expect(doc).toEqual({ inventory: { weapons: ['sword'] } });
    });

    it('should refuse ++ without a value or an array', () => {
      const doc: JsonObject = { inventory: { weapons: [] }, coins: 1 };

      expect(setPath(doc, 'inventory.weapons.++', undefined)).toBe(false);
      expect(setPath(doc, 'coins.++', 1)).toBe(false);
      expect(doc).toEqual({ inventory: { weapons: [] }, coins: 1 });
    });

    it('should remove by 1-based position with --', () => {
      const doc: JsonObject = { inventory: { weapons: ['sword', 'bow', 'axe'] } };

      expect(setPath(doc, 'inventory.weapons.--', 1)).toBe(true);
      expect(doc).toEqual({ inventory: { weapons: ['bow', 'axe'] } });

      expect(setPath(doc, 'inventory.weapons.--', '2')).toBe(true);
      expect(doc).toEqual({ inventory: { weapons: ['bow'] } });
    });

    it('should refuse -- with an invalid position', () => {
      const doc: JsonObject = { weapons: ['sword'] };

      expect(setPath(doc, 'weapons.--', 0)).toBe(false);
      expect(setPath(doc, 'weapons.--', 2)).toBe(false);
      expect(setPath(doc, 'weapons.--', 1.5)).toBe(false);
      expect(setPath(doc, 'weapons.--', 'first')).toBe(false);
      expect(doc).toEqual({ weapons: ['sword'] });
    });

    it('should assign, overwrite and delete keys', () => {
      const doc: JsonObject = { settings: { music: true } };

      expect(setPath(doc, 'settings.volume', 0.5)).toBe(true);
      expect(setPath(doc, 'settings.music', false)).toBe(true);
      expect(setPath(doc, 'settings.volume', undefined)).toBe(true);

      expect(doc).toEqual({ settings: { music: false } });
    });

    it('should replace array elements by 1-based position', () => {
      const doc: JsonObject = { weapons: ['sword', 'bow'] };

      expect(setPath(doc, 'weapons.2', 'axe')).toBe(true);
      expect(getPath(doc, 'weapons.2')).toBe('axe');
      expect(setPath(doc, 'weapons.3', 'spear')).toBe(false);
      expect(setPath(doc, 'weapons.0', 'spear')).toBe(false);
      expect(setPath(doc, 'weapons.1', undefined)).toBe(false);
      expect(doc).toEqual({ weapons: ['sword', 'axe'] });
    });

    it('should fail to delete a key that is not there', () => {
      const doc: JsonObject = { coins: 1 };

      expect(setPath(doc, 'gems', undefined)).toBe(false);
      expect(doc).toEqual({ coins: 1 });
    });

    it('should fail when the parent cannot hold the key', () => {
      const doc: JsonObject = { coins: 5, list: [1] };

      expect(setPath(doc, 'missing.key', 1)).toBe(false);
      expect(setPath(doc, 'coins.key', 1)).toBe(false);
      expect(setPath(doc, 'list.key', 1)).toBe(false);
      expect(doc).toEqual({ coins: 5, list: [1] });
    });
  });

  describe('incrementAt()', () => {
    it('should add to a number', () => {
      const doc: JsonObject = { coins: 100 };

      expect(incrementAt(doc, 'coins', 50)).toBe(true);
      expect(doc).toEqual({ coins: 150 });
    });

    it('should add to a number inside an array', () => {
      const doc: JsonObject = { scores: [1, 2] };

      expect(incrementAt(doc, 'scores.2', 5)).toBe(true);
      expect(doc).toEqual({ scores: [1, 7] });
    });

    it('should fail on absent or non-numeric values', () => {
      const doc: JsonObject = { name: 'x' };

      expect(incrementAt(doc, 'coins', 50)).toBe(false);
      expect(incrementAt(doc, 'name', 1)).toBe(false);
      expect(incrementAt(doc, 'name', NaN)).toBe(false);
      expect(doc).toEqual({ name: 'x' });
    });
  });

  describe('insertAt() and removeFrom()', () => {
    it('should append to and remove from arrays', () => {
      const doc: JsonObject = { items: [{ id: 1 }] };

      expect(insertAt(doc, 'items', { id: 2 })).toBe(true);
      expect(removeFrom(doc, 'items', { id: 1 })).toBe(true);
      expect(doc).toEqual({ items: [{ id: 2 }] });
    });

    it('should remove only the first deep-equal match', () => {
      const doc: JsonObject = { tags: ['a', 'b', 'a'] };

      expect(removeFrom(doc, 'tags', 'a')).toBe(true);
      expect(doc).toEqual({ tags: ['b', 'a'] });
    });

    it('should fail when the target is not an array or the value is absent', () => {
      const doc: JsonObject = { tags: ['a'], name: 'x' };

      expect(insertAt(doc, 'name', 'y')).toBe(false);
      expect(removeFrom(doc, 'tags', 'z')).toBe(false);
      expect(removeFrom(doc, 'missing', 'a')).toBe(false);
    });
  });

  describe('mergeMissing()', () => {
    it('should add missing keys without overwriting', () => {
      const target: JsonObject = { coins: 7, settings: { music: false } };
      const template: JsonObject = { coins: 0, level: 1, settings: { music: true, volume: 1 } };

      expect(mergeMissing(target, template)).toBe(true);
      expect(target).toEqual({ coins: 7, level: 1, settings: { music: false, volume: 1 } });
      expect(mergeMissing(target, template)).toBe(false);
    });

    it('should copy template values rather than share them', () => {
      const template: JsonObject = { list: [] };
      const target: JsonObject = {};

      mergeMissing(target, template);
      setPath(target, 'list.++', 1);

      expect(template).toEqual({ list: [] });
    });
  });
});
