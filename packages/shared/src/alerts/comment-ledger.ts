/**
 * Comment ledger
 *
 * Append-only comment files under `{record}/comments/`:
 *
 *   2025-12-14_21-15-23_X13K0G.txt      first comment by X13K0G in that second
 *   2025-12-14_21-15-23_X13K0G_1.txt    second one
 *
 * The name depends only on the comment's second, its author and the files
 * already present, so every device that appends the same comment to the same
 * thread state picks the same name. No millisecond clock is involved.
 */

import { decodeText, encodeText } from './content-hash';
import { AlertStoreError, toAlertStoreError } from './errors';
import { recordKey } from './path-codec';
import { COMMENTS_DIR, type RecordStore } from './record-store';
import { listDir, resolvePath, type StoreContext } from './store-context';
import { formatComment, parseCommentText } from './text-format';
import { formatCommentTimestamp, parseCommentTimestamp, truncateToSecond } from './timestamps';
import type { AlertComment, CommentInput, RecordPath } from './types';

const COMPONENT = 'CommentLedger';

const CALLSIGN_PATTERN = /^[A-Za-z0-9]+$/;
const COMMENT_NAME_PATTERN = /^(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})_([A-Za-z0-9]+)(?:_([1-9]\d*))?\.txt$/;
const LEGACY_COMMENT_NAME_PATTERN = /^(\d{12,14})\.txt$/;

export interface ParsedCommentFilename {
  timestamp: string;
  callsign: string;
  seq: number;
}

export function parseCommentFilename(filename: string): ParsedCommentFilename | null {
  const match = COMMENT_NAME_PATTERN.exec(filename);
  if (!match?.[1] || !match[2] || !parseCommentTimestamp(match[1])) {
    return null;
  }
  return { timestamp: match[1], callsign: match[2], seq: match[3] ? Number(match[3]) : 0 };
}

export function isLegacyCommentFilename(filename: string): boolean {
  return LEGACY_COMMENT_NAME_PATTERN.test(filename);
}

/**
 * Grammar check for comment names received from other devices
 */
export function isValidCommentName(filename: string): boolean {
  return parseCommentFilename(filename) !== null || isLegacyCommentFilename(filename);
}

/**
 * Next free name for (second, callsign) given the current listing.
 * The unsuffixed name counts as seq 0.
 */
export function nextCommentFilename(listing: readonly string[], createdAt: Date, callsign: string): string {
  const timestamp = formatCommentTimestamp(createdAt);
  let maxSeq = -1;
  for (const name of listing) {
    const parsed = parseCommentFilename(name);
    if (parsed && parsed.timestamp === timestamp && parsed.callsign === callsign) {
      maxSeq = Math.max(maxSeq, parsed.seq);
    }
  }
  return maxSeq < 0 ? `${timestamp}_${callsign}.txt` : `${timestamp}_${callsign}_${maxSeq + 1}.txt`;
}

export class CommentLedger {
  constructor(
    private readonly ctx: StoreContext,
    private readonly records: RecordStore
  ) {}

  /**
   * Append a comment and return its filename
   */
  async append(recordPath: RecordPath, comment: CommentInput): Promise<string> {
    if (!CALLSIGN_PATTERN.test(comment.authorCallsign)) {
      throw new AlertStoreError('Validation', `Invalid callsign: ${comment.authorCallsign}`, {
        operation: 'append',
        component: COMPONENT,
      });
    }
    const createdAt = truncateToSecond(comment.createdAt);
    const content = encodeText(
      formatComment({
        createdAt,
        authorCallsign: comment.authorCallsign,
        body: comment.body,
        signature: comment.signature,
        metadata: comment.metadata ?? [],
      })
    );

    return this.ctx.lock.runExclusive(recordKey(recordPath), async () => {
      const located = await this.records.locateOrThrow(recordPath, 'append');
      const dir = resolvePath(this.ctx, `${located}/${COMMENTS_DIR}`);
      const filename = nextCommentFilename(await listDir(this.ctx, dir, COMPONENT), createdAt, comment.authorCallsign);

      try {
        await this.ctx.fs.mkdir(dir);
        await this.ctx.fs.writeFile(this.ctx.fs.joinPath(dir, filename), content);
      } catch (error) {
        throw toAlertStoreError(error, 'append', COMPONENT, { recordPath: located, filename });
      }

      this.ctx.logger.info(`[${COMPONENT}] Appended ${filename}`, { recordPath: located });
      return filename;
    });
  }

  /**
   * Read the thread, oldest first. Legacy epoch-millisecond files are read as well.
   */
  async list(recordPath: RecordPath): Promise<AlertComment[]> {
    const located = await this.records.locateOrThrow(recordPath, 'listComments');
    const names = await listDir(this.ctx, resolvePath(this.ctx, `${located}/${COMMENTS_DIR}`), COMPONENT);

    const comments: AlertComment[] = [];
    for (const filename of names) {
      const parsedName = parseCommentFilename(filename);
      const legacy = isLegacyCommentFilename(filename);
      if (!parsedName && !legacy) {
        continue;
      }
      const text = decodeText(await this.records.readFile(`${located}/${COMMENTS_DIR}/${filename}`));
      try {
        const fields = parseCommentText(text);
        comments.push({ ...fields, filename, seq: parsedName?.seq ?? 0, legacy });
      } catch (error) {
        this.ctx.logger.warn(`[${COMPONENT}] Skipping unreadable comment ${filename}`, {
          recordPath: located,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return comments.sort(
      (a, b) =>
        a.createdAt.getTime() - b.createdAt.getTime() ||
        a.seq - b.seq ||
        (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0)
    );
  }
}
