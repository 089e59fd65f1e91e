import { createSerializationError, toError } from '../errors';
import { transcriptSchema } from '../schemas';
import type { Transcript, TranscriptJSON } from '../types';
import { deepFreeze, messageFromJSON, messageToJSON } from '../utilities';
import { assertTranscriptIntegrity } from './integrity';

/**
 * Converts a transcript to a plain JSON-serializable object.
 */
export function serializeTranscript(transcript: Transcript): TranscriptJSON {
  return {
    id: transcript.id,
    metadata: structuredClone({ ...transcript.metadata }),
    messages: transcript.messages.map(messageToJSON),
    createdAt: transcript.createdAt,
    updatedAt: transcript.updatedAt,
  };
}

/**
 * Reconstructs a transcript from JSON, validating its shape and integrity.
 * Throws a serialization error if validation fails.
 */
export function deserializeTranscript(json: unknown): Transcript {
  const parsed = transcriptSchema.safeParse(json);
  if (!parsed.success) {
    throw createSerializationError(
      `failed to deserialize transcript: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    );
  }

  const transcript: Transcript = {
    id: parsed.data.id,
    metadata: structuredClone(parsed.data.metadata),
    messages: parsed.data.messages.map(messageFromJSON),
    createdAt: parsed.data.createdAt,
    updatedAt: parsed.data.updatedAt,
  };

  try {
    assertTranscriptIntegrity(transcript);
  } catch (error) {
    throw createSerializationError(
      `failed to deserialize transcript: ${toError(error).message}`,
      toError(error),
    );
  }

  return deepFreeze(transcript);
}
