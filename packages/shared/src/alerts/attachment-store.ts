/**
 * Attachment store
 *
 * Copies photo bytes into the record's `images/` folder under the next
 * sequential name. Listing and writing happen under the record lock, so
 * concurrent attaches on one record get photo1..photoN without gaps.
 */

import {
  IMAGES_DIR,
  attachmentIndex,
  countAttachments,
  extensionOf,
  nextName,
  normalizeExtension,
  sortAttachments,
} from './attachment-renamer';
import { hashContent } from './content-hash';
import { AlertStoreError, toAlertStoreError } from './errors';
import { recordKey } from './path-codec';
import type { RecordStore } from './record-store';
import { listDir, resolvePath, type StoreContext } from './store-context';
import type { AttachmentResult, RecordPath } from './types';

const COMPONENT = 'AttachmentStore';

export class AttachmentStore {
  constructor(
    private readonly ctx: StoreContext,
    private readonly records: RecordStore
  ) {}

  /**
   * Attach a photo. `originalName` only supplies the extension.
   */
  async attach(recordPath: RecordPath, originalName: string, bytes: Uint8Array): Promise<AttachmentResult> {
    const requested = extensionOf(originalName);
    const { extension, coerced } = normalizeExtension(requested);
    if (coerced) {
      this.ctx.logger.warn(`[${COMPONENT}] AttachmentExtensionRejected, storing as .${extension}`, {
        recordPath,
        requestedExtension: requested,
      });
    }

    return this.ctx.lock.runExclusive(recordKey(recordPath), async () => {
      const located = await this.records.locateOrThrow(recordPath, 'attach');
      const imagesDir = resolvePath(this.ctx, `${located}/${IMAGES_DIR}`);
      const listing = await listDir(this.ctx, imagesDir, COMPONENT);
      const filename = nextName(countAttachments(listing), extension);

      // A gap in the numbering (e.g. photo1, photo3) means the next position is already taken
      const position = attachmentIndex(filename);
      const occupant = listing.find((name) => attachmentIndex(name) === position);
      if (occupant) {
        throw new AlertStoreError('ConflictingContent', `Position of ${filename} is already held by ${occupant}`, {
          operation: 'attach',
          component: COMPONENT,
          data: { recordPath: located, filename, occupant },
        });
      }

      try {
        await this.ctx.fs.mkdir(imagesDir);
        await this.ctx.fs.writeFile(this.ctx.fs.joinPath(imagesDir, filename), bytes);
      } catch (error) {
        throw toAlertStoreError(error, 'attach', COMPONENT, { recordPath: located, filename });
      }

      const result: AttachmentResult = {
        filename,
        relativePath: `${located}/${IMAGES_DIR}/${filename}`,
        contentHash: hashContent(bytes),
      };
      this.ctx.logger.info(`[${COMPONENT}] Attached ${filename}`, { recordPath: located, size: bytes.length });
      return result;
    });
  }

  /**
   * Attachment names in position order
   */
  async list(recordPath: RecordPath): Promise<string[]> {
    const located = await this.records.locateOrThrow(recordPath, 'listAttachments');
    return sortAttachments(await listDir(this.ctx, resolvePath(this.ctx, `${located}/${IMAGES_DIR}`), COMPONENT));
  }
}
