import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadDataset } from '../../../services/ingestion/DatasetLoader';
import { readRecords } from '../../../services/ingestion/RecordLoader';
import { readCatalog, parseCatalogEntries } from '../../../services/ingestion/CatalogLoader';
import { DatasetLoadError } from '../../../services/ingestion/errors';
import { RecommendationEngine } from '../../../services/recommendation/RecommendationEngine';

const recordsPath = path.join(__dirname, '../../fixtures/records.jsonl');
const catalogPath = path.join(__dirname, '../../fixtures/catalog.json');

describe('Dataset ingestion', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dataset-loader-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('readRecords', () => {
    it('parses each non-blank line and counts lines that are not JSON', async () => {
      const { records, unparsable } = await readRecords(recordsPath);

      expect(records).toHaveLength(6);
      expect(unparsable).toBe(1);
      expect(records[0]).toEqual({ user_id: 'u1', item_name: 'Alpha', playtime: 100, recommend: true });
      expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^⚠️ Skipping line 5 of /));
    });

    it('rejects a missing file', async () => {
      await expect(readRecords(path.join(tempDir, 'missing.jsonl'))).rejects.toThrow(DatasetLoadError);
    });
  });

  describe('readCatalog', () => {
    it('normalizes genre aliases and drops invalid entries', async () => {
      const catalog = await readCatalog(catalogPath);

      expect(catalog).toEqual([
        { itemName: 'Alpha', categories: ['Action'] },
        { itemName: 'Beta', categories: ['Action', 'RPG'] },
        { itemName: 'Gamma', categories: ['Sports'] },
        { itemName: 'Delta', categories: [] }
      ]);
      expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^⚠️ Skipping catalog entry 3:/));
    });

    it('rejects a file that is not valid JSON', async () => {
      const filePath = path.join(tempDir, 'broken.json');
      fs.writeFileSync(filePath, '[{"item_name": ');

      await expect(readCatalog(filePath)).rejects.toThrow('Catalog file is not valid JSON');
    });

    it('rejects a file that does not hold an array', async () => {
      const filePath = path.join(tempDir, 'object.json');
      fs.writeFileSync(filePath, '{"Alpha": ["Action"]}');

      const error = await readCatalog(filePath).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(DatasetLoadError);
      expect(error).toHaveProperty('filePath', filePath);
    });

    it('splits comma separated genres', () => {
      expect(parseCatalogEntries([{ item_name: 'Orchard', genre: 'Simulation, Casual' }])).toEqual([
        { itemName: 'Orchard', categories: ['Simulation', 'Casual'] }
      ]);
    });
  });

  describe('loadDataset', () => {
    it('builds the graph and tree and summarizes the load', async () => {
      const { graph, tree, summary } = await loadDataset({ recordsPath, catalogPath });

      expect(summary).toEqual({
        records: 5,
        skipped: 2,
        users: 2,
        items: 3,
        edges: 5,
        catalogEntries: 4
      });
      expect(graph.getWeight('u1', 'Alpha')).toBeCloseTo(1.5);
      expect(graph.getWeight('u2', 'Alpha')).toBeCloseTo(0.5);
      expect(graph.getWeight('u1', 'Beta')).toBe(0);
      expect(graph.getWeight('u2', 'Beta')).toBeCloseTo(0);
      expect(tree.allItemNames()).toEqual(['Alpha', 'Beta', 'Gamma']);
      expect(tree.contains('Delta')).toBe(false);
    });

    it('uses the configured root label', async () => {
      const { tree } = await loadDataset({ recordsPath, catalogPath }, undefined, 'Library');

      expect(tree.rootLabel).toBe('Library');
    });

    it('feeds reviews to the sentiment analyzer', async () => {
      const sentiment = { score: jest.fn().mockReturnValue(0.25) };
      const { graph } = await loadDataset({ recordsPath, catalogPath }, sentiment);

      expect(sentiment.score).toHaveBeenCalledTimes(1);
      expect(sentiment.score).toHaveBeenCalledWith('   ');
      expect(graph.getWeight('u1', 'Gamma')).toBeCloseTo(0.25);
    });

    it('produces a dataset the engine can serve', async () => {
      const { graph, tree } = await loadDataset({ recordsPath, catalogPath });
      const result = new RecommendationEngine(graph, tree).recommend('Alpha', 5, 1.5);

      expect(result.rankedItems).toEqual(['Beta']);
      expect(result.support.get('Beta')).toBe(2);
    });

    it('rejects when the catalog is missing', async () => {
      await expect(
        loadDataset({ recordsPath, catalogPath: path.join(tempDir, 'missing.json') })
      ).rejects.toThrow(DatasetLoadError);
    });
  });
});
