import type { ConversationMessage } from '../types.js';

/**
 * Text-generation service the conversation talks to. `history` holds the
 * messages exchanged so far (system prompt first); `prompt` is the new user
 * turn. Implementations return the raw reply text.
 */
export interface Backend {
  readonly name: string;
  send(prompt: string, history: readonly ConversationMessage[], signal?: AbortSignal): Promise<string>;
}

export type BackendType = 'ollama' | 'openai-compatible' | 'scripted';
