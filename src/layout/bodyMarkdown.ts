/**
 * Body Markdown
 *
 * Body text is Markdown. Rendering and measurement parse it with the same
 * markdown-it instance so the measured blocks are the blocks on screen.
 *
 * @module layout/bodyMarkdown
 */

import MarkdownIt from 'markdown-it';

type MarkdownToken = ReturnType<MarkdownIt['parse']>[number];

// Raw HTML in page content is escaped, never injected
const markdown = new MarkdownIt({
    html: false,
    linkify: true,
    breaks: true,
});

/**
 * Render body Markdown to an HTML string.
 */
export const renderBodyMarkdown = (text: string): string => markdown.render(text);

const inlineText = (token: MarkdownToken): string =>
    (token.children ?? [])
        .map((child) => (child.type === 'softbreak' || child.type === 'hardbreak' ? '\n' : child.content))
        .join('');

/**
 * Plain text of each rendered block (paragraph, heading, list item, code
 * block), in document order. Line breaks inside a block are kept as '\n'.
 */
export const extractTextBlocks = (text: string): string[] =>
    markdown
        .parse(text, {})
        .flatMap((token) => {
            if (token.type === 'inline') {
                return [inlineText(token)];
            }
            if (token.type === 'fence' || token.type === 'code_block') {
                return [token.content.replace(/\n$/, '')];
            }
            return [];
        })
        .filter((block) => block.trim().length > 0);
