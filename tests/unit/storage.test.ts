/**
 * Unit tests for the Storage Module
 * S3 requests are answered in process by a middleware on the client.
 */

import { describe, test, expect, beforeEach, afterEach, afterAll } from '@jest/globals';
import { NotFound, S3Client } from '@aws-sdk/client-s3';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { aggregate, renderMarkdown, serializeCsv, serializeJson } from '../../src/aggregator/index.js';
import {
  LocalDirectoryStorageAdapter,
  MemoryStorageAdapter,
  S3StorageAdapter,
  createStorageAdapter,
  saveReport,
} from '../../src/storage/index.js';
import type { AnalysisRecord, ArtifactMetadata, StorageAdapter } from '../../src/types/index.js';
import { createMockLogger } from '../helpers.js';

const ANALYSIS: AnalysisRecord = {
  URL: 'https://example.com',
  Content_Length: 18,
  answers: [{ key: 'SEO Keywords', outcome: { ok: true, value: 'tools, makers' } }],
};

const bundle = aggregate(
  'https://example.com',
  ANALYSIS,
  { answers: [{ key: 'SEO Improvements', outcome: { ok: true, value: '- Add a sitemap' } }] },
  { now: new Date('2024-01-15T10:30:05.000Z') }
);

const REPORT_ID = '20240115_103005_abcdef12';

// ============================================================================
// In-process S3
// ============================================================================

interface StoredObject {
  body: string;
  contentType: string | undefined;
  metadata: Record<string, string> | undefined;
}

function createInProcessS3() {
  const objects = new Map<string, StoredObject>();
  const commands: string[] = [];
  const client = new S3Client({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });

  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const input = args.input;
      commands.push(context.commandName ?? 'unknown');

      if (context.commandName === 'PutObjectCommand' && 'Key' in input && 'Body' in input) {
        objects.set(input.Key ?? '', {
          body: typeof input.Body === 'string' ? input.Body : '',
          contentType: 'ContentType' in input ? input.ContentType : undefined,
          metadata: 'Metadata' in input ? input.Metadata : undefined,
        });
        return { output: { $metadata: {} }, response: {} };
      }

      if (context.commandName === 'GetObjectCommand' && 'Key' in input) {
        const stored = objects.get(input.Key ?? '');
        if (!stored) {
          throw new NotFound({ $metadata: { httpStatusCode: 404 }, message: 'Not Found' });
        }
        return {
          output: {
            $metadata: {},
            Body: { transformToString: async () => stored.body },
            ContentType: stored.contentType,
            ContentLength: Buffer.byteLength(stored.body, 'utf-8'),
            Metadata: stored.metadata,
          },
          response: {},
        };
      }

      if (context.commandName === 'HeadObjectCommand' && 'Key' in input) {
        if (!objects.has(input.Key ?? '')) {
          throw new NotFound({ $metadata: { httpStatusCode: 404 }, message: 'Not Found' });
        }
        return { output: { $metadata: {} }, response: {} };
      }

      if (context.commandName === 'ListObjectsV2Command' && 'Prefix' in input) {
        const prefix = input.Prefix ?? '';
        const contents = Array.from(objects.entries())
          .filter(([key]) => key.startsWith(prefix))
          .map(([key, stored]) => ({
            Key: key,
            Size: Buffer.byteLength(stored.body, 'utf-8'),
            LastModified: new Date('2024-01-15T10:30:06.000Z'),
          }));
        return { output: { $metadata: {}, Contents: contents }, response: {} };
      }

      throw new Error(`Unexpected command ${context.commandName ?? 'unknown'}`);
    },
    { step: 'initialize', priority: 'high', name: 'inProcessS3' }
  );

  return { client, objects, commands };
}

// ============================================================================
// Shared adapter behavior
// ============================================================================

function describeAdapter(name: string, create: () => Promise<StorageAdapter>): void {
  describe(`${name} (shared behavior)`, () => {
    let storage: StorageAdapter;

    beforeEach(async () => {
      storage = await create();
    });

    test('should save an artifact and return metadata', async () => {
      const content = '{"a":1}';

      const metadata = await storage.save(REPORT_ID, 'json', content);

      expect(metadata).toEqual({
        reportId: REPORT_ID,
        artifactType: 'json',
        fileName: 'report.json',
        createdAt: expect.any(String),
        contentType: 'application/json',
        size: 7,
        checksum: expect.stringMatching(/^[0-9a-f]{32}$/),
      });
    });

    test('should load what was saved', async () => {
      await storage.save(REPORT_ID, 'csv', 'URL\nhttps://example.com\n');

      const { content, metadata } = await storage.load(REPORT_ID, 'csv');

      expect(content).toBe('URL\nhttps://example.com\n');
      expect(metadata.fileName).toBe('report.csv');
      expect(metadata.contentType).toBe('text/csv');
    });

    test('should report whether an artifact exists', async () => {
      await storage.save(REPORT_ID, 'markdown', '# Report\n');

      expect(await storage.exists(REPORT_ID, 'markdown')).toBe(true);
      expect(await storage.exists(REPORT_ID, 'json')).toBe(false);
    });

    test('should list the artifacts of one report only', async () => {
      await storage.save(REPORT_ID, 'json', '{}');
      await storage.save(REPORT_ID, 'markdown', '# Report\n');
      await storage.save('20240115_103005_00000000', 'json', '{}');

      const listed = await storage.list(REPORT_ID);

      expect(listed.map((artifact) => artifact.artifactType).sort()).toEqual(['json', 'markdown']);
      expect(listed.every((artifact) => artifact.reportId === REPORT_ID)).toBe(true);
    });

    test('should return an empty list for an unknown report', async () => {
      expect(await storage.list('20990101_000000_ffffffff')).toEqual([]);
    });
  });
}

describe('Storage Module', () => {
  describeAdapter('MemoryStorageAdapter', async () => new MemoryStorageAdapter());

  describeAdapter('S3StorageAdapter', async () => {
    const { client } = createInProcessS3();
    return new S3StorageAdapter({ bucket: 'test-bucket', client });
  });

  describe('MemoryStorageAdapter', () => {
    test('should throw for a missing artifact', async () => {
      await expect(new MemoryStorageAdapter().load(REPORT_ID, 'json')).rejects.toThrow(
        `Artifact not found: ${REPORT_ID}/json`
      );
    });

    test('should clear stored artifacts', async () => {
      const storage = new MemoryStorageAdapter();
      await storage.save(REPORT_ID, 'json', '{}');

      storage.clear();

      expect(storage.size()).toBe(0);
    });
  });

  describe('S3StorageAdapter', () => {
    test('should write objects under the prefix and report id', async () => {
      const { client, objects } = createInProcessS3();
      const storage = new S3StorageAdapter({ bucket: 'test-bucket', prefix: 'exports', client });

      await storage.save(REPORT_ID, 'markdown', '# Report\n', { 'website-url': 'https://example.com' });

      const stored = objects.get(`exports/${REPORT_ID}/report.md`);
      expect(stored?.body).toBe('# Report\n');
      expect(stored?.contentType).toBe('text/markdown');
      expect(stored?.metadata?.['report-id']).toBe(REPORT_ID);
      expect(stored?.metadata?.['website-url']).toBe('https://example.com');
    });
  });

  describe('LocalDirectoryStorageAdapter', () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(join(tmpdir(), 'site-analyzer-'));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    const sharedRoots: string[] = [];

    afterAll(async () => {
      for (const dir of sharedRoots) {
        await rm(dir, { recursive: true, force: true });
      }
    });

    describeAdapter('LocalDirectoryStorageAdapter', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'site-analyzer-shared-'));
      sharedRoots.push(dir);
      return new LocalDirectoryStorageAdapter(dir);
    });

    test('should write files under the report directory', async () => {
      const storage = new LocalDirectoryStorageAdapter(root);

      await storage.save(REPORT_ID, 'json', '{"ok":true}');

      expect(await readFile(join(root, REPORT_ID, 'report.json'), 'utf-8')).toBe('{"ok":true}');
    });

    test('should throw for a missing artifact', async () => {
      await expect(new LocalDirectoryStorageAdapter(root).load(REPORT_ID, 'csv')).rejects.toThrow(
        `Artifact not found: ${REPORT_ID}/csv`
      );
    });
  });

  describe('createStorageAdapter()', () => {
    test('should build the adapter for each target', () => {
      expect(createStorageAdapter({ type: 'memory' })).toBeInstanceOf(MemoryStorageAdapter);
      expect(createStorageAdapter({ type: 'local', directory: '/tmp/reports' })).toBeInstanceOf(
        LocalDirectoryStorageAdapter
      );
      expect(createStorageAdapter({ type: 's3', bucket: 'test-bucket' })).toBeInstanceOf(S3StorageAdapter);
    });
  });

  describe('saveReport()', () => {
    test('should store the JSON, CSV and Markdown views under the report id', async () => {
      const storage = new MemoryStorageAdapter();

      const result = await saveReport(bundle, storage, createMockLogger());

      expect(result.success).toBe(true);
      expect(result.data?.map((artifact) => artifact.artifactType)).toEqual(['json', 'csv', 'markdown']);
      expect(result.metadata.reportId).toBe(bundle.reportId);
      expect((await storage.load(bundle.reportId, 'json')).content).toBe(serializeJson(bundle));
      expect((await storage.load(bundle.reportId, 'csv')).content).toBe(serializeCsv(bundle));
      expect((await storage.load(bundle.reportId, 'markdown')).content).toBe(renderMarkdown(bundle));
    });

    test('should return EXPORT_FAILED when the sink rejects', async () => {
      const failing: StorageAdapter = {
        save: async (): Promise<ArtifactMetadata> => {
          throw new Error('disk full');
        },
        load: async () => {
          throw new Error('unused');
        },
        exists: async () => false,
        list: async () => [],
      };
      const logger = createMockLogger();

      const result = await saveReport(bundle, failing, logger);

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('EXPORT_FAILED');
      expect(result.error?.message).toBe('disk full');
      expect(logger.error).toHaveBeenCalledWith('Report export failed', {
        reportId: bundle.reportId,
        error: 'disk full',
      });
    });
  });
});
