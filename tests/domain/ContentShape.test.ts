import { parseKnownTime, resolveContent } from '../../src/domain/model/ContentShape.js';
import type { DescribedBlob } from '../../src/domain/model/DescribedBlob.js';
import { makeRef } from '../helpers/fakes.js';

const PERMANODE = 'sha1-' + '1'.repeat(40);
const CONTENT = makeRef('abcdef0123');

function permanode(content: string[]): DescribedBlob {
    return { blobRef: PERMANODE, permanode: { attr: { content } } };
}

function metaOf(...blobs: DescribedBlob[]): Map<string, DescribedBlob> {
    return new Map(blobs.map(b => [b.blobRef, b]));
}

describe('resolveContent', () => {
    it('is unresolved when the response has no description', () => {
        expect(resolveContent(PERMANODE, null)).toEqual({
            kind: 'unresolved',
            reason: 'response carries no description'
        });
    });

    it('is unresolved when the match is not described', () => {
        expect(resolveContent(PERMANODE, new Map()).kind).toBe('unresolved');
    });

    it('is unresolved when the match is not a permanode', () => {
        const meta = metaOf({ blobRef: PERMANODE, file: { fileName: 'a', mimeType: '', size: 0 } });
        expect(resolveContent(PERMANODE, meta)).toEqual({
            kind: 'unresolved',
            reason: `${PERMANODE} is not a permanode`
        });
    });

    it('is unresolved when the content attribute is missing or invalid', () => {
        expect(resolveContent(PERMANODE, metaOf(permanode([]))).kind).toBe('unresolved');
        expect(resolveContent(PERMANODE, metaOf(permanode(['not-a-ref!']))).kind).toBe('unresolved');
    });

    it('is unresolved when the content item is not described', () => {
        expect(resolveContent(PERMANODE, metaOf(permanode([CONTENT])))).toEqual({
            kind: 'unresolved',
            reason: `no description for content ${CONTENT}`
        });
    });

    it('is unresolved when the content is neither file nor directory', () => {
        const meta = metaOf(permanode([CONTENT]), { blobRef: CONTENT, camliType: 'bytes' });
        expect(resolveContent(PERMANODE, meta)).toEqual({
            kind: 'unresolved',
            reason: `content ${CONTENT} is neither a file nor a directory`
        });
    });

    it('resolves a file with its name, MIME type and time', () => {
        const item: DescribedBlob = {
            blobRef: CONTENT,
            file: { fileName: 'cat.jpg', mimeType: 'image/jpeg', size: 12, time: '2021-03-04T05:06:07Z' }
        };
        const shape = resolveContent(PERMANODE, metaOf(permanode([CONTENT]), item));
        expect(shape).toEqual({
            kind: 'file',
            ref: { hashName: 'sha224', digest: CONTENT.slice('sha224-'.length) },
            item,
            name: 'cat.jpg',
            mimeType: 'image/jpeg',
            time: new Date('2021-03-04T05:06:07Z')
        });
    });

    it('resolves a directory', () => {
        const item: DescribedBlob = { blobRef: CONTENT, dir: { fileName: 'albums' } };
        const shape = resolveContent(PERMANODE, metaOf(permanode([CONTENT]), item));
        expect(shape.kind).toBe('directory');
        expect(shape.kind === 'directory' && shape.name).toBe('albums');
    });

    it('uses the first value of the content attribute', () => {
        const other = makeRef('9999999999');
        const item: DescribedBlob = { blobRef: CONTENT, dir: { fileName: 'first' } };
        const shape = resolveContent(PERMANODE, metaOf(permanode([CONTENT, other]), item));
        expect(shape.kind === 'directory' && shape.name).toBe('first');
    });
});

describe('parseKnownTime', () => {
    it('parses RFC 3339 timestamps', () => {
        expect(parseKnownTime('2020-01-02T03:04:05Z')).toEqual(new Date(Date.UTC(2020, 0, 2, 3, 4, 5)));
    });

    it('keeps times before the Unix epoch', () => {
        expect(parseKnownTime('1965-03-01T00:00:00Z')).toEqual(new Date(Date.UTC(1965, 2, 1)));
    });

    it.each([undefined, '', 'yesterday', '1970-01-01T00:00:00Z', '0001-01-01T00:00:00Z'])(
        'treats %j as unknown',
        value => {
            expect(parseKnownTime(value)).toBeNull();
        }
    );
});
