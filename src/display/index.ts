export { formatMessageBody, Markdown, MarkdownDisplay } from './markdown';
export { TerminalDisplay } from './terminal';
