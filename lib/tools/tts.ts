/**
 * TTS Tool - Text-to-speech using OpenAI, one voice per speaker
 */

import OpenAI from 'openai';
import type { SpeechSynthesizer } from '../collaborators';
import { CollaboratorRequestError, CollaboratorTransportError } from '../errors';
import type { MediaHandle } from '../types';
import { Logger } from '../utils';
import { stripEmotionTags } from '../agents/enhancer';
import type { StorageTool } from './storage';

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type OpenAIVoice = (typeof OPENAI_VOICES)[number];

export function isOpenAIVoice(value: string): value is OpenAIVoice {
  return OPENAI_VOICES.some(voice => voice === value);
}

export class TtsTool implements SpeechSynthesizer {
  constructor(
    private readonly client: OpenAI,
    private readonly storage: StorageTool,
    private readonly model: string,
    private readonly voices: Record<string, string>,
    private readonly speed: number = 0.95 // slightly slower for a conversational pace
  ) {}

  voiceFor(speaker: string): OpenAIVoice {
    const voice = this.voices[speaker];
    if (!voice || !isOpenAIVoice(voice)) {
      throw new CollaboratorRequestError(
        'speech',
        `no usable voice for speaker "${speaker}" (configured: ${voice ?? 'none'})`
      );
    }
    return voice;
  }

  async synthesize(request: { speaker: string; text: string; key: string }): Promise<MediaHandle> {
    const voice = this.voiceFor(request.speaker);
    // OpenAI voices read bracketed tags aloud
    const input = stripEmotionTags(request.text);

    Logger.info('Starting TTS call', { speaker: request.speaker, voice, characters: input.length });

    const response = await this.client.audio.speech.create({
      model: this.model,
      voice,
      input,
      response_format: 'mp3',
      speed: this.speed,
    });

    const buffer = Buffer.from(await response.arrayBuffer());
    if (buffer.length === 0) {
      throw new CollaboratorTransportError('speech', 'TTS returned an empty audio buffer');
    }

    const path = `media/${request.key}/audio.mp3`;
    const url = await this.storage.put(path, buffer, 'audio/mpeg');

    Logger.info('TTS synthesis complete', { speaker: request.speaker, bytes: buffer.length, path });
    return { kind: 'audio', url, storage_path: path };
  }
}
