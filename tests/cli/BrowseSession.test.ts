import { BrowseSession } from '../../src/cli/utils/BrowseSession.js';
import { QueryDirectory, SEARCH_README } from '../../src/vfs/QueryDirectory.js';
import { FakeSearchBackend, makeRef, ResponseBuilder } from '../helpers/fakes.js';

describe('BrowseSession', () => {
    let backend: FakeSearchBackend;
    let session: BrowseSession;

    beforeEach(() => {
        backend = new FakeSearchBackend(new ResponseBuilder()
            .file(makeRef('1111111111'), { fileName: 'cat.jpg', mimeType: 'image/jpeg', size: 7 })
            .dir(makeRef('2222222222'), 'album')
            .build());
        session = new BrowseSession(new QueryDirectory(backend));
    });

    it('starts at the root with the readme', async () => {
        expect(session.prompt()).toBe('searchfs:/> ');
        await expect(session.execute('ls')).resolves.toEqual({ output: 'README.txt' });
    });

    it('enters a quoted search expression and lists its matches', async () => {
        await session.execute('cd "is:image and tag:\\"pets\\""');

        expect(session.cwd()).toBe('/is:image and tag:"pets"');
        await expect(session.execute('ls')).resolves.toEqual({ output: 'cat.jpg\nalbum/' });
        expect(backend.queries[0]?.expression).toBe('is:image and tag:"pets"');
    });

    it('reuses the listing of the directory it is in', async () => {
        await session.execute('cd is:image');
        await session.execute('ls');
        await session.execute('ls');
        await session.execute('stat cat.jpg');

        expect(backend.queries).toHaveLength(1);
    });

    it('shows attributes of a match', async () => {
        await session.execute('cd is:image');
        const result = await session.execute('stat cat.jpg');

        expect(result.output.split('\n')).toContain(`Blob: ${makeRef('1111111111')}`);
        expect(result.output.split('\n')).toContain('Mode: -rw-rw-rw-');
        expect(result.output.split('\n')).toContain('Size: 7');
    });

    it('reports a missing name without leaving the directory', async () => {
        await session.execute('cd is:image');

        await expect(session.execute('stat dog.jpg')).resolves.toEqual({
            output: 'Error: No entry named "dog.jpg" in search "is:image" (ENOENT)'
        });
        expect(session.cwd()).toBe('/is:image');
    });

    it('reports a failing search as an I/O error', async () => {
        backend.enqueue(new Error('down'));
        await session.execute('cd is:image');

        await expect(session.execute('ls')).resolves.toEqual({
            output: 'Error: Search for "is:image" failed (EIO)'
        });
    });

    it('refuses to cd into a file', async () => {
        await expect(session.execute('cd README.txt')).resolves.toEqual({
            output: 'Error: README.txt: Not a directory'
        });
        expect(session.cwd()).toBe('/');
    });

    it('goes back up with cd ..', async () => {
        await session.execute('cd is:image');
        await session.execute('cd ..');
        await session.execute('cd ..');

        expect(session.cwd()).toBe('/');
    });

    it('prints the readme', async () => {
        await expect(session.execute('cat README.txt')).resolves.toEqual({ output: SEARCH_README });
    });

    it('does not print match contents', async () => {
        await session.execute('cd is:image');

        await expect(session.execute('cat cat.jpg')).resolves.toEqual({
            output: 'Error: cat.jpg: content is served by the blob store, not by searchfs'
        });
    });

    it('handles blank lines, unknown commands and exit', async () => {
        await expect(session.execute('   ')).resolves.toEqual({ output: '' });
        await expect(session.execute('rm x')).resolves.toEqual({
            output: 'Error: Unknown command: rm (try "help")'
        });
        await expect(session.execute('exit')).resolves.toEqual({ output: '', exit: true });
    });
});
