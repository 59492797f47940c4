/**
 * Voice output boundary.
 *
 * Text-to-speech rendering lives outside the engine; anything that can say
 * a string implements VoiceOutput. The speech queue in front of it makes
 * every call fire-and-forget.
 */

export interface VoiceOutput {
  speak(text: string): void | Promise<void>;
}

/** Writes instructions to the console; the default when no TTS is attached */
export class ConsoleVoiceOutput implements VoiceOutput {
  speak(text: string): void {
    console.log(`[tts] ${text}`);
  }
}
