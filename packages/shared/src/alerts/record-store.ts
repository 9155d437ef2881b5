/**
 * Record store
 *
 * Creates, reads and moves record directories under the alerts root.
 * `create` runs only on the authoring device; the other operations work on
 * literal record paths and run anywhere.
 */

import { IMAGES_DIR, sortAttachments } from './attachment-renamer';
import { decodeText, encodeText, hashContent } from './content-hash';
import { AlertStoreError, toAlertStoreError } from './errors';
import {
  MIN_BUCKET_PRECISION,
  bucketFor,
  derivePath,
  isCanonicalRecordPath,
  parseRecordPath,
  recordKey,
  validateCoordinates,
  withState,
} from './path-codec';
import { listDir, resolvePath, type StoreContext } from './store-context';
import { formatManifest, parseManifest } from './text-format';
import { truncateToSecond } from './timestamps';
import {
  LifecycleState,
  type AlertDraft,
  type AlertRecord,
  type RecordPath,
  type SyncPayload,
} from './types';

const COMPONENT = 'RecordStore';

export const MANIFEST_FILE = 'manifest.txt';
export const COMMENTS_DIR = 'comments';

const STATES = [LifecycleState.Active, LifecycleState.Expired] as const;
const BUCKET_DIR_PATTERN = /^-?\d{1,2}\.\d{1,6}_-?\d{1,3}\.\d{1,6}$/;

/**
 * One file of a record, relative to the record directory
 */
export interface RecordTreeEntry {
  path: string;
  contentHash: string;
}

export class RecordStore {
  constructor(private readonly ctx: StoreContext) {}

  /**
   * Create a new record. Derives the canonical path exactly once.
   * @throws AlertStoreError SlugCollision if a record with the same bucket and slug exists
   */
  async create(draft: AlertDraft): Promise<RecordPath> {
    validateCoordinates(draft.coordinates);
    const createdAt = truncateToSecond(draft.createdAt);
    const bucketPrecision = await this.resolveBucketPrecision(draft);
    const path = derivePath(draft.coordinates, createdAt, draft.title, { bucketPrecision });

    const manifest = formatManifest({
      title: draft.title,
      createdAt,
      authorDeviceId: draft.authorDeviceId,
      coordinates: draft.coordinates,
      body: draft.body,
      signature: draft.signature,
      metadata: draft.metadata ?? [],
    });

    await this.ctx.lock.runExclusive(recordKey(path), async () => {
      // A folder without a manifest is left over from a failed create; finish it
      const existing = await this.locate(path);
      if (existing && (existing !== path || (await this.exists(existing)))) {
        throw new AlertStoreError('SlugCollision', `A record already exists at ${existing}`, {
          operation: 'create',
          component: COMPONENT,
          data: { path: existing },
        });
      }
      if (existing) {
        this.ctx.logger.warn(`[${COMPONENT}] Completing record left without a manifest`, { path });
      }
      await this.writeRecordSkeleton(path, encodeText(manifest));
    });

    this.ctx.logger.info(`[${COMPONENT}] Created record`, { path, bucketPrecision });
    return path;
  }

  /**
   * Create `{slug}/`, `images/`, `comments/` and write the manifest.
   * Shared with replication, which passes the received manifest bytes.
   */
  async writeRecordSkeleton(path: RecordPath, manifest: Uint8Array, signal?: AbortSignal): Promise<void> {
    const dir = resolvePath(this.ctx, path);
    try {
      await this.ctx.fs.mkdir(dir);
      await this.ctx.fs.mkdir(this.ctx.fs.joinPath(dir, IMAGES_DIR));
      await this.ctx.fs.mkdir(this.ctx.fs.joinPath(dir, COMMENTS_DIR));
      await this.ctx.fs.writeFile(this.ctx.fs.joinPath(dir, MANIFEST_FILE), manifest, { signal });
    } catch (error) {
      throw toAlertStoreError(error, 'writeRecordSkeleton', COMPONENT, { path });
    }
  }

  /**
   * Bucket precision for a new record: 1 unless that bucket is full,
   * then one more digit, up to maxBucketPrecision.
   */
  private async resolveBucketPrecision(draft: AlertDraft): Promise<number> {
    const { bucketCapacity, maxBucketPrecision } = this.ctx.config;
    for (let precision = MIN_BUCKET_PRECISION; precision < maxBucketPrecision; precision++) {
      const bucket = bucketFor(draft.coordinates, precision);
      const count = await this.countBucket(bucket);
      if (count < bucketCapacity) {
        return precision;
      }
      this.ctx.logger.debug(`[${COMPONENT}] Bucket full, fanning out`, { bucket, count });
    }
    return maxBucketPrecision;
  }

  /**
   * Number of record folders in a bucket, active and expired
   */
  async countBucket(bucket: string): Promise<number> {
    let count = 0;
    for (const state of STATES) {
      const entries = await listDir(this.ctx, resolvePath(this.ctx, `${bucket}/${state}`), COMPONENT);
      count += entries.filter((slug) => isCanonicalRecordPath(`${bucket}/${state}/${slug}`)).length;
    }
    return count;
  }

  /**
   * Read a record. The lifecycle state comes from the path.
   */
  async read(path: RecordPath): Promise<AlertRecord> {
    const { state } = parseRecordPath(path);
    const manifest = parseManifest(decodeText(await this.readFile(`${path}/${MANIFEST_FILE}`)));
    return {
      path,
      title: manifest.title,
      createdAt: manifest.createdAt,
      coordinates: manifest.coordinates,
      authorDeviceId: manifest.authorDeviceId,
      lifecycleState: state,
      body: manifest.body,
      signature: manifest.signature,
      metadata: manifest.metadata,
    };
  }

  async exists(path: RecordPath): Promise<boolean> {
    parseRecordPath(path);
    return this.ctx.fs.exists(resolvePath(this.ctx, `${path}/${MANIFEST_FILE}`));
  }

  /**
   * Where the record with this bucket and slug lives now, in either state
   */
  async locate(path: RecordPath): Promise<RecordPath | null> {
    const { state } = parseRecordPath(path);
    const candidates = [state, ...STATES.filter((s) => s !== state)];
    for (const candidate of candidates) {
      const located = withState(path, candidate);
      if (await this.ctx.fs.exists(resolvePath(this.ctx, located))) {
        return located;
      }
    }
    return null;
  }

  async locateOrThrow(path: RecordPath, operation: string): Promise<RecordPath> {
    const located = await this.locate(path);
    if (!located) {
      throw new AlertStoreError('NotFound', `No record at ${path}`, {
        operation,
        component: COMPONENT,
        data: { path },
      });
    }
    return located;
  }

  /**
   * Move a record between states by renaming the state segment only.
   * Moving a record that is already in `toState` is a no-op.
   */
  async move(path: RecordPath, fromState: LifecycleState, toState: LifecycleState): Promise<RecordPath> {
    if (fromState === LifecycleState.Expired && toState === LifecycleState.Active) {
      throw new AlertStoreError('InvalidTransition', 'Expired records cannot be reactivated', {
        operation: 'move',
        component: COMPONENT,
        data: { path },
      });
    }

    const source = withState(path, fromState);
    const target = withState(path, toState);

    return this.ctx.lock.runExclusive(recordKey(path), async () => {
      const sourceExists = await this.ctx.fs.exists(resolvePath(this.ctx, source));
      const targetExists = await this.ctx.fs.exists(resolvePath(this.ctx, target));

      if (targetExists && (!sourceExists || source === target)) {
        return target;
      }
      if (!sourceExists) {
        throw new AlertStoreError('NotFound', `No record at ${source}`, {
          operation: 'move',
          component: COMPONENT,
          data: { path: source },
        });
      }
      if (targetExists) {
        throw new AlertStoreError('ConflictingContent', `Record exists in both states: ${target}`, {
          operation: 'move',
          component: COMPONENT,
          data: { source, target },
        });
      }

      try {
        const { bucket } = parseRecordPath(target);
        await this.ctx.fs.mkdir(resolvePath(this.ctx, `${bucket}/${toState}`));
        await this.ctx.fs.rename(resolvePath(this.ctx, source), resolvePath(this.ctx, target));
      } catch (error) {
        throw toAlertStoreError(error, 'move', COMPONENT, { source, target });
      }

      this.ctx.logger.info(`[${COMPONENT}] Moved record`, { from: source, to: target });
      return target;
    });
  }

  /**
   * All record paths under the root, sorted. Optionally one state only.
   * Folders without a manifest are not records yet and are skipped.
   */
  async list(state?: LifecycleState): Promise<RecordPath[]> {
    const states = state ? [state] : STATES;
    const buckets = (await listDir(this.ctx, this.ctx.root, COMPONENT)).filter((name) =>
      BUCKET_DIR_PATTERN.test(name)
    );

    const paths: RecordPath[] = [];
    for (const bucket of buckets) {
      for (const s of states) {
        const slugs = await listDir(this.ctx, resolvePath(this.ctx, `${bucket}/${s}`), COMPONENT);
        for (const slug of slugs) {
          const candidate = `${bucket}/${s}/${slug}`;
          if (!isCanonicalRecordPath(candidate)) {
            continue;
          }
          if (await this.exists(candidate)) {
            paths.push(candidate);
          } else {
            this.ctx.logger.debug(`[${COMPONENT}] Skipping folder without manifest`, { path: candidate });
          }
        }
      }
    }
    return paths.sort();
  }

  /**
   * Read a file relative to the alerts root
   */
  async readFile(relative: string): Promise<Uint8Array> {
    try {
      return await this.ctx.fs.readFile(resolvePath(this.ctx, relative));
    } catch (error) {
      throw toAlertStoreError(error, 'readFile', COMPONENT, { path: relative });
    }
  }

  /**
   * Every file of a record with its hash, sorted by relative path.
   * Two replicas are identical when their trees are equal.
   */
  async buildTree(path: RecordPath): Promise<RecordTreeEntry[]> {
    const located = await this.locateOrThrow(path, 'buildTree');
    const dir = resolvePath(this.ctx, located);
    const entries: RecordTreeEntry[] = [];

    const walk = async (absolute: string, prefix: string): Promise<void> => {
      for (const name of await listDir(this.ctx, absolute, COMPONENT)) {
        const child = this.ctx.fs.joinPath(absolute, name);
        const relative = prefix ? `${prefix}/${name}` : name;
        const stats = await this.ctx.fs.stat(child);
        if (stats.isDirectory) {
          await walk(child, relative);
        } else {
          entries.push({ path: relative, contentHash: hashContent(await this.ctx.fs.readFile(child)) });
        }
      }
    };

    await walk(dir, '');
    return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /**
   * Payloads that reproduce the record on another device: the manifest,
   * every attachment, every comment, and the lifecycle change when expired.
   * Names are the literal ones on disk.
   */
  async exportPayloads(path: RecordPath): Promise<SyncPayload[]> {
    const located = await this.locateOrThrow(path, 'exportPayloads');
    const payloads: SyncPayload[] = [await this.payloadFor(located, MANIFEST_FILE, 'record')];

    const images = await listDir(this.ctx, resolvePath(this.ctx, `${located}/${IMAGES_DIR}`), COMPONENT);
    for (const filename of sortAttachments(images)) {
      payloads.push(await this.payloadFor(located, `${IMAGES_DIR}/${filename}`, 'attachment', filename));
    }

    const comments = await listDir(this.ctx, resolvePath(this.ctx, `${located}/${COMMENTS_DIR}`), COMPONENT);
    for (const filename of comments.filter((name) => name.endsWith('.txt')).sort()) {
      payloads.push(await this.payloadFor(located, `${COMMENTS_DIR}/${filename}`, 'comment', filename));
    }

    if (parseRecordPath(located).state === LifecycleState.Expired) {
      payloads.push({ path: located, kind: 'lifecycle' });
    }
    return payloads;
  }

  private async payloadFor(
    path: RecordPath,
    relativeFile: string,
    kind: SyncPayload['kind'],
    filename?: string
  ): Promise<SyncPayload> {
    const bytes = await this.readFile(`${path}/${relativeFile}`);
    return { path, kind, filename, bytes, contentHash: hashContent(bytes) };
  }
}
