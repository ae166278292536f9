import { describe, it, expect } from '@jest/globals';
import { extractTextBlocks, renderBodyMarkdown } from '../bodyMarkdown';

describe('bodyMarkdown', () => {
    describe('renderBodyMarkdown', () => {
        it('renders emphasis and links', () => {
            expect(renderBodyMarkdown('Read the **policy** at [docs](https://example.test)')).toBe(
                '<p>Read the <strong>policy</strong> at <a href="https://example.test">docs</a></p>\n'
            );
        });

        it('escapes raw HTML', () => {
            expect(renderBodyMarkdown('<b>hi</b>')).toBe('<p>&lt;b&gt;hi&lt;/b&gt;</p>\n');
        });

        it('keeps single newlines as line breaks', () => {
            expect(renderBodyMarkdown('one\ntwo')).toBe('<p>one<br>\ntwo</p>\n');
        });
    });

    describe('extractTextBlocks', () => {
        it('returns the text of each block without markup', () => {
            expect(extractTextBlocks('# Steps\n\n**Bold** words\n\n- one\n- [two](https://example.test)')).toEqual([
                'Steps',
                'Bold words',
                'one',
                'two',
            ]);
        });

        it('keeps line breaks inside a paragraph', () => {
            expect(extractTextBlocks('First line\nstill first\n\n  Second  ')).toEqual([
                'First line\nstill first',
                'Second',
            ]);
        });

        it('includes code blocks', () => {
            expect(extractTextBlocks('```\nnpm start\n```')).toEqual(['npm start']);
        });

        it('returns nothing for whitespace', () => {
            expect(extractTextBlocks('   \n\n ')).toEqual([]);
        });
    });
});
