import type { SupabaseClient } from '@supabase/supabase-js';
import { RemoteRequestError } from './remoteStore';

export const VOICE_NOTE_CONTENT_TYPE = 'audio/m4a';

export function voiceNotePath(userId: string, entryId: string): string {
  return `${userId}/voice_notes/${entryId}.m4a`;
}

export interface VoiceNoteStore {
  /** Stores the audio under `path`, replacing an earlier upload, and resolves to its URL. */
  upload(path: string, audio: Uint8Array): Promise<string>;
}

export class InMemoryVoiceNoteStore implements VoiceNoteStore {
  files = new Map<string, Uint8Array>();

  async upload(path: string, audio: Uint8Array): Promise<string> {
    this.files.set(path, audio);
    return `memory://voice-notes/${path}`;
  }
}

export class SupabaseVoiceNoteStore implements VoiceNoteStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string
  ) {}

  async upload(path: string, audio: Uint8Array): Promise<string> {
    const storage = this.client.storage.from(this.bucket);
    const { error } = await storage.upload(path, audio, {
      contentType: VOICE_NOTE_CONTENT_TYPE,
      upsert: true
    });
    if (error) {
      throw new RemoteRequestError(error.message);
    }
    return storage.getPublicUrl(path).data.publicUrl;
  }
}
