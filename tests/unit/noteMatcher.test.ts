import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NoteMatcher } from '../../src/notes/note-matcher';
import { TestVault, createRecordingLogger, createTestVault } from '../helpers/vault';

describe('NoteMatcher', () => {
    let vault: TestVault;

    beforeEach(async () => {
        vault = await createTestVault();
        await vault.write({
            'b.md': 'Top\n![[clip.mp3]]\n',
            'notes/a.md': '![x](Audio/clip.mp3)\n\ntext\n![[clip.mp3]]\n',
            'notes/other.md': '![[clip10.mp3]]\n',
            'notes/readme.txt': '![[clip.mp3]]\n',
            'transcripts/clip_transcript.md': '![[clip.mp3]]\n',
            '.obsidian/cache.md': '![[clip.mp3]]\n',
        });
    });

    afterEach(async () => {
        await vault.cleanup();
    });

    it('lists markdown notes outside the transcripts folder and hidden folders', async () => {
        const matcher = new NoteMatcher(await vault.config());

        expect(await matcher.listNotes()).toEqual([
            path.join(vault.vault, 'b.md'),
            path.join(vault.vault, 'notes', 'a.md'),
            path.join(vault.vault, 'notes', 'other.md'),
        ]);
    });

    it('finds every embed, ordered by note path then offset', async () => {
        const matcher = new NoteMatcher(await vault.config());

        const matches = await matcher.findNotesWithAudio('clip');

        expect(matches.map((m) => [path.relative(vault.vault, m.notePath), m.offset, m.variant])).toEqual([
            ['b.md', 4, 'wikilink-embed'],
            [path.join('notes', 'a.md'), 0, 'standard-embed'],
            [path.join('notes', 'a.md'), 27, 'wikilink-embed'],
        ]);
    });

    it('returns nothing when no note embeds the file', async () => {
        const matcher = new NoteMatcher(await vault.config());
        expect(await matcher.findNotesWithAudio('silence')).toEqual([]);
    });

    it('skips a note that is not valid in the vault encoding', async () => {
        await fs.writeFile(path.join(vault.vault, 'broken.md'), Buffer.from([0x21, 0x5b, 0x5b, 0xff, 0xfe, 0x5d, 0x5d]));
        const logger = createRecordingLogger();
        const matcher = new NoteMatcher(await vault.config(), logger);

        const matches = await matcher.findNotesWithAudio('clip');

        expect(matches).toHaveLength(3);
        expect(logger.lines).toHaveLength(1);
        expect(logger.lines[0]).toMatch(/^WARNING ⚠️ Skipping note .*broken\.md: unreadable as utf-8: /);
    });
});
