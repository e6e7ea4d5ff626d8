import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

const terminalMarked = new Marked(markedTerminal({ reflowText: true, width: 100 }));

/** Renders a Markdown answer with terminal styling (bold, lists, code blocks, tables). */
export const renderMarkdown = (markdown: string): string =>
  terminalMarked.parse(markdown, { async: false }).replace(/\n+$/, '');
