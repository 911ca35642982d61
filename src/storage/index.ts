/**
 * Storage Module
 *
 * Point-in-time export sinks for finished reports.
 *
 * Responsibilities:
 * - S3StorageAdapter using AWS SDK v3
 * - LocalDirectoryStorageAdapter writing under a directory on disk
 * - MemoryStorageAdapter for tests
 * - saveReport: write the JSON, CSV and Markdown views of one bundle
 *
 * Storage paths:
 * - {prefix}/{report_id}/report.json
 * - {prefix}/{report_id}/report.csv
 * - {prefix}/{report_id}/report.md
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3ServiceException,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { renderMarkdown, serializeCsv, serializeJson } from '../aggregator/index.js';
import { createConsoleLogger, errorMessage, type Logger } from '../logging/index.js';
import type {
  ArtifactMetadata,
  ExportArtifactType,
  ExportBundle,
  ModuleResult,
  ReportId,
  StorageAdapter,
} from '../types/index.js';

export type { StorageAdapter };

export const ARTIFACT_FILE_NAMES: Record<ExportArtifactType, string> = {
  json: 'report.json',
  csv: 'report.csv',
  markdown: 'report.md',
};

export const ARTIFACT_CONTENT_TYPES: Record<ExportArtifactType, string> = {
  json: 'application/json',
  csv: 'text/csv',
  markdown: 'text/markdown',
};

const ARTIFACT_TYPES: ExportArtifactType[] = ['json', 'csv', 'markdown'];

function artifactTypeOf(fileName: string): ExportArtifactType | undefined {
  return ARTIFACT_TYPES.find((type) => ARTIFACT_FILE_NAMES[type] === fileName);
}

/**
 * MD5 checksum of UTF-8 content
 */
function calculateChecksum(content: string): string {
  return createHash('md5').update(content, 'utf-8').digest('hex');
}

function buildMetadata(reportId: ReportId, artifactType: ExportArtifactType, content: string, createdAt: string): ArtifactMetadata {
  return {
    reportId,
    artifactType,
    fileName: ARTIFACT_FILE_NAMES[artifactType],
    createdAt,
    contentType: ARTIFACT_CONTENT_TYPES[artifactType],
    size: Buffer.byteLength(content, 'utf-8'),
    checksum: calculateChecksum(content),
  };
}

// ============================================================================
// S3
// ============================================================================

export interface S3Config {
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'reports') */
  prefix?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  forcePathStyle?: boolean;
  /** Pre-built client, for tests */
  client?: S3Client;
}

export class S3StorageAdapter implements StorageAdapter {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3Config) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'reports';

    if (config.client) {
      this.client = config.client;
    } else {
      const clientConfig: S3ClientConfig = {
        region: config.region ?? 'us-east-1',
      };
      if (config.endpoint) {
        clientConfig.endpoint = config.endpoint;
      }
      if (config.forcePathStyle) {
        clientConfig.forcePathStyle = true;
      }
      this.client = new S3Client(clientConfig);
    }
  }

  private getKey(reportId: ReportId, artifactType: ExportArtifactType): string {
    return `${this.prefix}/${reportId}/${ARTIFACT_FILE_NAMES[artifactType]}`;
  }

  async save(
    reportId: ReportId,
    artifactType: ExportArtifactType,
    content: string,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const artifact = buildMetadata(reportId, artifactType, content, new Date().toISOString());

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(reportId, artifactType),
        Body: content,
        ContentType: artifact.contentType,
        Metadata: {
          ...metadata,
          'report-id': reportId,
          'artifact-type': artifactType,
          'created-at': artifact.createdAt,
          checksum: artifact.checksum ?? '',
        },
      })
    );

    return artifact;
  }

  async load(
    reportId: ReportId,
    artifactType: ExportArtifactType
  ): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(reportId, artifactType),
      })
    );

    if (!response.Body) {
      throw new Error(`Artifact not found: ${reportId}/${artifactType}`);
    }

    const content = await response.Body.transformToString();
    const metadata: ArtifactMetadata = {
      reportId,
      artifactType,
      fileName: ARTIFACT_FILE_NAMES[artifactType],
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? ARTIFACT_CONTENT_TYPES[artifactType],
    };
    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }
    if (response.Metadata?.checksum) {
      metadata.checksum = response.Metadata.checksum;
    }

    return { content, metadata };
  }

  async exists(reportId: ReportId, artifactType: ExportArtifactType): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(reportId, artifactType),
        })
      );
      return true;
    } catch (error: unknown) {
      if (
        error instanceof S3ServiceException &&
        (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404)
      ) {
        return false;
      }
      throw error;
    }
  }

  async list(reportId: ReportId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: `${this.prefix}/${reportId}/`,
      })
    );

    const artifacts: ArtifactMetadata[] = [];
    for (const object of response.Contents ?? []) {
      const fileName = object.Key?.split('/').pop() ?? '';
      const artifactType = artifactTypeOf(fileName);
      if (!artifactType) continue;

      const metadata: ArtifactMetadata = {
        reportId,
        artifactType,
        fileName,
        createdAt: object.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: ARTIFACT_CONTENT_TYPES[artifactType],
      };
      if (object.Size !== undefined) {
        metadata.size = object.Size;
      }
      artifacts.push(metadata);
    }
    return artifacts;
  }
}

// ============================================================================
// Local Directory
// ============================================================================

/**
 * Writes each report under {root}/{report_id}/
 */
export class LocalDirectoryStorageAdapter implements StorageAdapter {
  constructor(private readonly root: string) {}

  private reportDir(reportId: ReportId): string {
    return join(this.root, reportId);
  }

  private filePath(reportId: ReportId, artifactType: ExportArtifactType): string {
    return join(this.reportDir(reportId), ARTIFACT_FILE_NAMES[artifactType]);
  }

  async save(reportId: ReportId, artifactType: ExportArtifactType, content: string): Promise<ArtifactMetadata> {
    await mkdir(this.reportDir(reportId), { recursive: true });
    await writeFile(this.filePath(reportId, artifactType), content, 'utf-8');
    return buildMetadata(reportId, artifactType, content, new Date().toISOString());
  }

  async load(
    reportId: ReportId,
    artifactType: ExportArtifactType
  ): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const path = this.filePath(reportId, artifactType);
    if (!(await this.exists(reportId, artifactType))) {
      throw new Error(`Artifact not found: ${reportId}/${artifactType}`);
    }
    const content = await readFile(path, 'utf-8');
    const info = await stat(path);
    return { content, metadata: buildMetadata(reportId, artifactType, content, info.mtime.toISOString()) };
  }

  async exists(reportId: ReportId, artifactType: ExportArtifactType): Promise<boolean> {
    try {
      const info = await stat(this.filePath(reportId, artifactType));
      return info.isFile();
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async list(reportId: ReportId): Promise<ArtifactMetadata[]> {
    let entries: string[];
    try {
      entries = await readdir(this.reportDir(reportId));
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const artifacts: ArtifactMetadata[] = [];
    for (const artifactType of ARTIFACT_TYPES) {
      if (entries.includes(ARTIFACT_FILE_NAMES[artifactType])) {
        const { metadata } = await this.load(reportId, artifactType);
        artifacts.push(metadata);
      }
    }
    return artifacts;
  }
}

// ============================================================================
// Memory
// ============================================================================

export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string; metadata: ArtifactMetadata }> = new Map();

  private getKey(reportId: ReportId, artifactType: ExportArtifactType): string {
    return `${reportId}/${artifactType}`;
  }

  async save(reportId: ReportId, artifactType: ExportArtifactType, content: string): Promise<ArtifactMetadata> {
    const metadata = buildMetadata(reportId, artifactType, content, new Date().toISOString());
    this.store.set(this.getKey(reportId, artifactType), { content, metadata });
    return metadata;
  }

  async load(
    reportId: ReportId,
    artifactType: ExportArtifactType
  ): Promise<{ content: string; metadata: ArtifactMetadata }> {
    const item = this.store.get(this.getKey(reportId, artifactType));
    if (!item) {
      throw new Error(`Artifact not found: ${reportId}/${artifactType}`);
    }
    return item;
  }

  async exists(reportId: ReportId, artifactType: ExportArtifactType): Promise<boolean> {
    return this.store.has(this.getKey(reportId, artifactType));
  }

  async list(reportId: ReportId): Promise<ArtifactMetadata[]> {
    const prefix = `${reportId}/`;
    const artifacts: ArtifactMetadata[] = [];
    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }
    return artifacts;
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }
}

// ============================================================================
// Factory / Export
// ============================================================================

export type StorageTarget =
  | ({ type: 's3' } & S3Config)
  | { type: 'local'; directory: string }
  | { type: 'memory' };

export function createStorageAdapter(target: StorageTarget): StorageAdapter {
  switch (target.type) {
    case 's3':
      return new S3StorageAdapter(target);
    case 'local':
      return new LocalDirectoryStorageAdapter(target.directory);
    case 'memory':
      return new MemoryStorageAdapter();
  }
}

/**
 * Store the JSON, CSV and Markdown views of one bundle under its report id
 */
export async function saveReport(
  bundle: ExportBundle,
  storage: StorageAdapter,
  logger: Logger = createConsoleLogger('storage')
): Promise<ModuleResult<ArtifactMetadata[]>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const views: Record<ExportArtifactType, string> = {
    json: serializeJson(bundle),
    csv: serializeCsv(bundle),
    markdown: renderMarkdown(bundle),
  };

  try {
    const artifacts: ArtifactMetadata[] = [];
    for (const artifactType of ARTIFACT_TYPES) {
      artifacts.push(
        await storage.save(bundle.reportId, artifactType, views[artifactType], { 'website-url': bundle.website_url })
      );
    }

    logger.info('Report exported', { reportId: bundle.reportId, artifacts: artifacts.length });
    return {
      success: true,
      data: artifacts,
      metadata: { module: 'storage', timestamp, reportId: bundle.reportId, duration: Date.now() - startTime },
    };
  } catch (error) {
    logger.error('Report export failed', { reportId: bundle.reportId, error: errorMessage(error) });
    return {
      success: false,
      error: {
        code: 'EXPORT_FAILED',
        message: errorMessage(error),
        details: error,
      },
      metadata: { module: 'storage', timestamp, reportId: bundle.reportId, duration: Date.now() - startTime },
    };
  }
}
