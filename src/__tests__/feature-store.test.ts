/**
 * =============================================================================
 * FEATURE STORE - Unit Tests
 * =============================================================================
 *
 * Loading (inline + file), exact lookups and region scans.
 * =============================================================================
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { ErrorCode } from '../core/constants';
import { FeatureLoadError } from '../core/errors/AppError';
import { FeatureStore } from '../modules/route-guide/feature-store.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const BUNDLED_DATASET = path.resolve(__dirname, '../../data/route_guide_db.json');

const DATASET = [
  { name: 'Harbor Gate', location: { latitude: 100, longitude: 100 } },
  { name: 'Upper Mill', location: { latitude: 200, longitude: 300 } },
  { name: '', location: { latitude: 150, longitude: 200 } },
  { name: 'Far Outpost', location: { latitude: 900, longitude: 900 } },
  { name: 'Harbor Gate Annex', location: { latitude: 100, longitude: 100 } },
];

function loadedStore(): FeatureStore {
  const store = new FeatureStore();
  store.load(DATASET);
  return store;
}

describe('FeatureStore', () => {
  // ===========================================================================
  // LOADING
  // ===========================================================================

  describe('load', () => {
    it('loads every record in order', () => {
      const store = new FeatureStore();

      expect(store.isLoaded).toBe(false);
      expect(store.load(DATASET)).toBe(5);
      expect(store.isLoaded).toBe(true);
      expect(store.size).toBe(5);
    });

    it('defaults a missing name to the empty string', () => {
      const store = new FeatureStore();
      store.load([{ location: { latitude: 1, longitude: 2 } }]);

      expect(store.findExact({ latitude: 1, longitude: 2 })).toEqual({
        name: '',
        location: { latitude: 1, longitude: 2 },
      });
    });

    it('accepts an empty dataset', () => {
      const store = new FeatureStore();

      expect(store.load([])).toBe(0);
      expect(store.isLoaded).toBe(true);
    });

    it('refuses a second load', () => {
      const store = loadedStore();

      expect(() => store.load(DATASET)).toThrow(FeatureLoadError);
      try {
        store.load([]);
      } catch (error) {
        expect(error).toBeInstanceOf(FeatureLoadError);
        expect(error).toMatchObject({ code: ErrorCode.FEATURE_STORE_ALREADY_LOADED });
      }
      expect(store.size).toBe(5);
    });

    it('names the bad record and field', () => {
      const store = new FeatureStore();
      const data = [
        { name: 'ok', location: { latitude: 1, longitude: 2 } },
        { name: 'bad', location: { latitude: 1.5, longitude: 2 } },
      ];

      expect(() => store.load(data, 'test.json')).toThrow(
        'Invalid features in test.json: record 1 (location.latitude): '
      );
    });

    it('rejects a record without a location', () => {
      const store = new FeatureStore();

      expect(() => store.load([{ name: 'Nowhere' }])).toThrow(
        'Invalid features in inline dataset: record 0 (location): '
      );
    });

    it('rejects coordinates outside int32', () => {
      const store = new FeatureStore();

      expect(() => store.load([{ location: { latitude: 2147483648, longitude: 0 } }])).toThrow(
        'record 0 (location.latitude)'
      );
    });

    it('rejects a dataset that is not an array', () => {
      const store = new FeatureStore();

      expect(() => store.load({ features: [] })).toThrow('Invalid features in inline dataset: dataset: ');
    });

    it('stays unloaded after a failed load', () => {
      const store = new FeatureStore();

      expect(() => store.load('nope')).toThrow(FeatureLoadError);
      expect(store.isLoaded).toBe(false);
      expect(store.load(DATASET)).toBe(5);
    });

    it('keeps its own frozen copies', () => {
      const data = [{ name: 'Copy', location: { latitude: 5, longitude: 6 } }];
      const store = new FeatureStore();
      store.load(data);
      data[0].name = 'Changed';

      const feature = store.findExact({ latitude: 5, longitude: 6 });
      expect(feature?.name).toBe('Copy');
      expect(Object.isFrozen(feature)).toBe(true);
    });
  });

  describe('loadFromFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'features-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('loads a JSON file', async () => {
      const file = path.join(dir, 'features.json');
      await writeFile(file, JSON.stringify(DATASET));
      const store = new FeatureStore();

      await expect(store.loadFromFile(file)).resolves.toBe(5);
      expect(store.findExact({ latitude: 200, longitude: 300 })?.name).toBe('Upper Mill');
    });

    it('reports a missing file as unreadable', async () => {
      const store = new FeatureStore();

      await expect(store.loadFromFile(path.join(dir, 'missing.json'))).rejects.toMatchObject({
        name: 'FeatureLoadError',
        code: ErrorCode.FEATURES_FILE_UNREADABLE,
      });
      expect(store.isLoaded).toBe(false);
    });

    it('reports malformed JSON as invalid', async () => {
      const file = path.join(dir, 'broken.json');
      await writeFile(file, '[{"name": "half"');
      const store = new FeatureStore();

      await expect(store.loadFromFile(file)).rejects.toMatchObject({
        code: ErrorCode.FEATURES_FILE_INVALID,
      });
    });

    it('names the file when a record is invalid', async () => {
      const file = path.join(dir, 'bad-record.json');
      await writeFile(file, JSON.stringify([{ name: 'x', location: { latitude: 'north', longitude: 0 } }]));
      const store = new FeatureStore();

      await expect(store.loadFromFile(file)).rejects.toThrow(
        `Invalid features in ${file}: record 0 (location.latitude)`
      );
    });

    it('loads the bundled dataset', async () => {
      const store = new FeatureStore();

      await expect(store.loadFromFile(BUNDLED_DATASET)).resolves.toBe(18);
      expect(store.findExact({ latitude: 473768210, longitude: 85417130 })?.name).toBe(
        'Old Mill Bridge, 4 Riverside Walk'
      );
    });
  });

  // ===========================================================================
  // LOOKUPS
  // ===========================================================================

  describe('findExact', () => {
    it('returns the first feature at the point', () => {
      expect(loadedStore().findExact({ latitude: 100, longitude: 100 })?.name).toBe('Harbor Gate');
    });

    it('returns undefined when nothing is there', () => {
      expect(loadedStore().findExact({ latitude: 100, longitude: 101 })).toBeUndefined();
    });

    it('finds nothing before loading', () => {
      expect(new FeatureStore().findExact({ latitude: 100, longitude: 100 })).toBeUndefined();
    });
  });

  describe('countExact', () => {
    it('counts every feature at the point', () => {
      const store = loadedStore();

      expect(store.countExact({ latitude: 100, longitude: 100 })).toBe(2);
      expect(store.countExact({ latitude: 150, longitude: 200 })).toBe(1);
      expect(store.countExact({ latitude: 0, longitude: 0 })).toBe(0);
    });
  });

  describe('findInRegion', () => {
    it('yields features inside the rectangle in load order, edges included', () => {
      const names = Array.from(
        loadedStore().findInRegion({
          lo: { latitude: 100, longitude: 100 },
          hi: { latitude: 200, longitude: 300 },
        }),
        feature => feature.name
      );

      expect(names).toEqual(['Harbor Gate', 'Upper Mill', '', 'Harbor Gate Annex']);
    });

    it('gives the same result with swapped corners', () => {
      const store = loadedStore();
      const forward = Array.from(store.findInRegion({
        lo: { latitude: 100, longitude: 100 },
        hi: { latitude: 1000, longitude: 1000 },
      }));
      const swapped = Array.from(store.findInRegion({
        lo: { latitude: 1000, longitude: 1000 },
        hi: { latitude: 100, longitude: 100 },
      }));

      expect(swapped).toEqual(forward);
      expect(forward).toHaveLength(5);
    });

    it('yields nothing for an empty region', () => {
      const features = Array.from(loadedStore().findInRegion({
        lo: { latitude: -50, longitude: -50 },
        hi: { latitude: -10, longitude: -10 },
      }));

      expect(features).toEqual([]);
    });

    it('covers the whole dataset with the full int32 rectangle', async () => {
      const store = new FeatureStore();
      await store.loadFromFile(BUNDLED_DATASET);

      const features = Array.from(store.findInRegion({
        lo: { latitude: -2147483648, longitude: -2147483648 },
        hi: { latitude: 2147483647, longitude: 2147483647 },
      }));

      expect(features).toHaveLength(18);
      expect(features.filter(feature => feature.name === '')).toHaveLength(4);
    });
  });
});
