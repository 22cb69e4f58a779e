/**
 * Speech Synthesizer
 *
 * Narrates summary text through the Azure Speech REST API. Each language
 * tag maps to a fixed voice; audio comes back as 16-bit PCM WAV.
 */
import type { SpeechConfig, VoiceConfig } from '../lib/config.js';
import { SynthesisError } from '../lib/errors.js';
import { describeStatus, escapeXml, fetchWithTimeout, type FetchLike } from '../lib/http.js';
import { createLogger } from '../lib/logger.js';
import type { AudioClip } from '../types/story.js';

const log = createLogger('speech-synthesizer');

export interface SpeechSynthesizerOptions {
  fetch?: FetchLike;
}

/**
 * SSML document for one voice
 */
export function buildSsml(text: string, voice: VoiceConfig): string {
  return (
    `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${escapeXml(voice.locale)}">` +
    `<voice name="${escapeXml(voice.voice)}">${escapeXml(text)}</voice>` +
    `</speak>`
  );
}

export class SpeechSynthesizer {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: SpeechConfig,
    options: SpeechSynthesizerOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get endpoint(): string {
    return `https://${this.config.region ?? ''}.tts.speech.microsoft.com/cognitiveservices/v1`;
  }

  supports(language: string): boolean {
    return Object.hasOwn(this.config.voices, language);
  }

  async synthesize(storyId: string, text: string, language: string): Promise<AudioClip> {
    const voice = this.supports(language) ? this.config.voices[language] : undefined;
    if (!voice) {
      throw new SynthesisError(`No voice configured for language "${language}"`, { storyId, language });
    }
    if (!this.config.key || !this.config.region) {
      throw new SynthesisError('Speech key or region is not configured', { storyId, language });
    }

    log.info(`Starting speech synthesis for ${storyId} [${language}] with ${voice.voice}`);

    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.fetchImpl,
        this.endpoint,
        {
          method: 'POST',
          headers: {
            'Ocp-Apim-Subscription-Key': this.config.key,
            'Content-Type': 'application/ssml+xml',
            'X-Microsoft-OutputFormat': this.config.outputFormat,
            'User-Agent': 'hn-narrator',
          },
          body: buildSsml(text, voice),
        },
        this.config.timeout
      );
    } catch (err) {
      throw new SynthesisError(
        `Speech service unreachable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err, storyId, language }
      );
    }

    if (!response.ok) {
      throw new SynthesisError(`Speech synthesis failed: ${describeStatus(response)}`, { storyId, language });
    }

    let audio: Buffer;
    try {
      audio = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw new SynthesisError('Could not read synthesized audio', { cause: err, storyId, language });
    }
    if (audio.length === 0) {
      throw new SynthesisError('Speech service returned no audio', { storyId, language });
    }

    log.info(`Speech synthesis completed for ${storyId} [${language}] (${audio.length} bytes)`);
    return { storyId, language, audio };
  }
}
