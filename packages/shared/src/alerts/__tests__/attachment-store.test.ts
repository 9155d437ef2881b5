import { hashContent } from '../content-hash';
import { LogLevel } from '../../logging/types';
import { LifecycleState } from '../types';
import { ROOT, bytes, createTestStore, draft } from './test-utils';

const PATH = '38.7_-9.1/active/2025-12-14_15-32_test-alert-with-photos';

describe('AttachmentStore', () => {
  it('should store photos under sequential names', async () => {
    const { fs, store } = createTestStore();
    await store.records.create(draft());

    const first = await store.attachments.attach(PATH, 'IMG_0042.JPG', bytes('first'));
    const second = await store.attachments.attach(PATH, 'holiday.png', bytes('second'));

    expect(first).toEqual({
      filename: 'photo1.jpg',
      relativePath: `${PATH}/images/photo1.jpg`,
      contentHash: hashContent(bytes('first')),
    });
    expect(second.filename).toBe('photo2.png');
    expect(fs.text(`${ROOT}/${PATH}/images/photo2.png`)).toBe('second');
    expect(await store.attachments.list(PATH)).toEqual(['photo1.jpg', 'photo2.png']);
  });

  it('should give concurrent attaches distinct names without gaps', async () => {
    const { store } = createTestStore();
    await store.records.create(draft());

    const results = await Promise.all(
      Array.from({ length: 8 }, (_, i) => store.attachments.attach(PATH, `upload-${i}.jpg`, bytes(`photo ${i}`)))
    );

    expect(results.map((r) => r.filename).sort()).toEqual(
      ['photo1.jpg', 'photo2.jpg', 'photo3.jpg', 'photo4.jpg', 'photo5.jpg', 'photo6.jpg', 'photo7.jpg', 'photo8.jpg']
    );
  });

  it('should refuse to overwrite a photo when the numbering has a gap', async () => {
    const { fs, store } = createTestStore();
    await store.records.create(draft());
    await fs.writeFile(`${ROOT}/${PATH}/images/photo1.jpg`, bytes('one'));
    await fs.writeFile(`${ROOT}/${PATH}/images/photo3.png`, bytes('three'));

    await expect(store.attachments.attach(PATH, 'new.jpg', bytes('new'))).rejects.toMatchObject({
      kind: 'ConflictingContent',
      message: 'Position of photo3.jpg is already held by photo3.png',
    });
    expect(fs.text(`${ROOT}/${PATH}/images/photo3.png`)).toBe('three');
    expect(fs.files.has(`${ROOT}/${PATH}/images/photo3.jpg`)).toBe(false);
  });

  it('should store unknown types as bin and log a warning', async () => {
    const { logger, store } = createTestStore();
    await store.records.create(draft());

    const result = await store.attachments.attach(PATH, 'scan.tiff', bytes('tiff'));

    expect(result.filename).toBe('photo1.bin');
    expect(logger.messages(LogLevel.Warn)).toEqual([
      '[AttachmentStore] AttachmentExtensionRejected, storing as .bin',
    ]);
  });

  it('should ignore stray files when numbering', async () => {
    const { fs, store } = createTestStore();
    await store.records.create(draft());
    await fs.writeFile(`${ROOT}/${PATH}/images/.photo1.jpg.tmp`, bytes('partial'));

    expect((await store.attachments.attach(PATH, 'a.jpg', bytes('a'))).filename).toBe('photo1.jpg');
  });

  it('should attach to a record that has expired', async () => {
    const { store } = createTestStore();
    await store.records.create(draft());
    const expired = await store.records.move(PATH, LifecycleState.Active, LifecycleState.Expired);

    const result = await store.attachments.attach(PATH, 'late.webp', bytes('late'));

    expect(result.relativePath).toBe(`${expired}/images/photo1.webp`);
  });

  it('should fail for an unknown record', async () => {
    const { store } = createTestStore();
    await expect(store.attachments.attach(PATH, 'a.jpg', bytes('a'))).rejects.toMatchObject({ kind: 'NotFound' });
  });
});
