/**
 * Legacy entry point. Same implementation as `chatlab`; new code should import from there.
 */
export { Markdown } from '../display/markdown';
export { ai, assistant, human, narrate, system, user } from '../messaging';
