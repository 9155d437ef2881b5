import { LogLevel } from '../../logging/types';
import {
  isLegacyCommentFilename,
  isValidCommentName,
  nextCommentFilename,
  parseCommentFilename,
} from '../comment-ledger';
import { ROOT, bytes, createTestStore, draft } from './test-utils';

const PATH = '38.7_-9.1/active/2025-12-14_15-32_test-alert-with-photos';
const SECOND = new Date('2025-12-14T21:15:23Z');

describe('comment names', () => {
  it('should parse the sequence suffix', () => {
    expect(parseCommentFilename('2025-12-14_21-15-23_X13K0G.txt')).toEqual({
      timestamp: '2025-12-14_21-15-23',
      callsign: 'X13K0G',
      seq: 0,
    });
    expect(parseCommentFilename('2025-12-14_21-15-23_X13K0G_2.txt')?.seq).toBe(2);
  });

  it.each([
    ['2025-12-14_21-15-23_X13K0G.txt', true],
    ['2025-12-14_21-15-23_X13K0G_1.txt', true],
    ['1734210000000.txt', true],
    ['2025-12-14_21-15-23_X13K0G_0.txt', false],
    ['2025-12-14_21-15-23_X13-K0G.txt', false],
    ['../2025-12-14_21-15-23_X13K0G.txt', false],
    ['2025-12-14_21-15-23_X13K0G.md', false],
  ])('should check %s', (name, valid) => {
    expect(isValidCommentName(name)).toBe(valid);
  });

  it('should recognise legacy epoch names', () => {
    expect(isLegacyCommentFilename('1734210000000.txt')).toBe(true);
    expect(isLegacyCommentFilename('17342.txt')).toBe(false);
  });

  describe('nextCommentFilename', () => {
    it('should use the bare name for the first comment in a second', () => {
      expect(nextCommentFilename([], SECOND, 'X13K0G')).toBe('2025-12-14_21-15-23_X13K0G.txt');
    });

    it('should continue after the highest sequence', () => {
      const listing = ['2025-12-14_21-15-23_X13K0G.txt', '2025-12-14_21-15-23_X13K0G_3.txt'];
      expect(nextCommentFilename(listing, SECOND, 'X13K0G')).toBe('2025-12-14_21-15-23_X13K0G_4.txt');
    });

    it('should count each author and second separately', () => {
      const listing = ['2025-12-14_21-15-23_X13K0G.txt', '2025-12-14_21-15-22_AB12.txt'];
      expect(nextCommentFilename(listing, SECOND, 'AB12')).toBe('2025-12-14_21-15-23_AB12.txt');
    });

    it('should be a function of its inputs only', () => {
      const listing = ['2025-12-14_21-15-23_X13K0G.txt'];
      expect(nextCommentFilename(listing, SECOND, 'X13K0G')).toBe(nextCommentFilename(listing, SECOND, 'X13K0G'));
    });
  });
});

describe('CommentLedger', () => {
  it('should number comments posted in the same second', async () => {
    const { store } = createTestStore();
    await store.records.create(draft());

    const first = await store.comments.append(PATH, {
      createdAt: new Date('2025-12-14T21:15:23.100Z'),
      authorCallsign: 'X13K0G',
      body: 'one',
    });
    const second = await store.comments.append(PATH, {
      createdAt: new Date('2025-12-14T21:15:23.900Z'),
      authorCallsign: 'X13K0G',
      body: 'two',
    });

    expect(first).toBe('2025-12-14_21-15-23_X13K0G.txt');
    expect(second).toBe('2025-12-14_21-15-23_X13K0G_1.txt');
  });

  it('should write the comment text format', async () => {
    const { fs, store } = createTestStore();
    await store.records.create(draft());

    const filename = await store.comments.append(PATH, {
      createdAt: SECOND,
      authorCallsign: 'X13K0G',
      body: 'Still blocked.',
      signature: 'sig1',
    });

    expect(fs.text(`${ROOT}/${PATH}/comments/${filename}`)).toBe(
      '> 2025-12-14 21:15_23 -- X13K0G\nStill blocked.\n--> signature: sig1\n'
    );
  });

  it('should give concurrent appends distinct names', async () => {
    const { store } = createTestStore();
    await store.records.create(draft());

    const names = await Promise.all(
      [0, 1, 2, 3].map((i) =>
        store.comments.append(PATH, { createdAt: SECOND, authorCallsign: 'X13K0G', body: `comment ${i}` })
      )
    );

    expect([...names].sort()).toEqual([
      '2025-12-14_21-15-23_X13K0G.txt',
      '2025-12-14_21-15-23_X13K0G_1.txt',
      '2025-12-14_21-15-23_X13K0G_2.txt',
      '2025-12-14_21-15-23_X13K0G_3.txt',
    ]);
  });

  it('should reject a callsign that cannot appear in a file name', async () => {
    const { store } = createTestStore();
    await store.records.create(draft());

    await expect(
      store.comments.append(PATH, { createdAt: SECOND, authorCallsign: '../X1', body: 'x' })
    ).rejects.toMatchObject({ kind: 'Validation' });
  });

  it('should list the thread oldest first, including legacy files', async () => {
    const { fs, store } = createTestStore();
    await store.records.create(draft());
    await store.comments.append(PATH, { createdAt: SECOND, authorCallsign: 'X13K0G', body: 'b' });
    await store.comments.append(PATH, { createdAt: SECOND, authorCallsign: 'X13K0G', body: 'c' });
    await fs.writeFile(
      `${ROOT}/${PATH}/comments/1734206400000.txt`,
      bytes('> 2025-12-14 20:00_00 -- OLD1\nfrom an older version\n')
    );

    const comments = await store.comments.list(PATH);

    expect(comments.map((c) => [c.filename, c.body, c.seq, c.legacy])).toEqual([
      ['1734206400000.txt', 'from an older version', 0, true],
      ['2025-12-14_21-15-23_X13K0G.txt', 'b', 0, false],
      ['2025-12-14_21-15-23_X13K0G_1.txt', 'c', 1, false],
    ]);
  });

  it('should skip unreadable comment files with a warning', async () => {
    const { fs, logger, store } = createTestStore();
    await store.records.create(draft());
    await fs.writeFile(`${ROOT}/${PATH}/comments/2025-12-14_22-00-00_BAD.txt`, bytes('garbage'));
    await fs.writeFile(`${ROOT}/${PATH}/comments/notes.md`, bytes('ignored'));

    expect(await store.comments.list(PATH)).toEqual([]);
    expect(logger.messages(LogLevel.Warn)).toEqual([
      '[CommentLedger] Skipping unreadable comment 2025-12-14_22-00-00_BAD.txt',
    ]);
  });
});
