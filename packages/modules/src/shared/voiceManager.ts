export type SpeechPriority = "normal" | "high";

/** The part of `SpeechSynthesis` the manager uses. */
export type SpeechPort = {
  readonly speaking: boolean;
  getVoices(): SpeechSynthesisVoice[];
  speak(utterance: SpeechSynthesisUtterance): void;
  cancel(): void;
};

export type VoiceSettings = {
  rate: number;
  pitch: number;
  volume: number;
};

export const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  rate: 0.9,
  pitch: 1,
  volume: 0.8
};

const browserSpeech = (): SpeechPort | null =>
  typeof window !== "undefined" && "speechSynthesis" in window ? window.speechSynthesis : null;

export function pickVoice(voices: SpeechSynthesisVoice[]): SpeechSynthesisVoice | null {
  return (
    voices.find((voice) => voice.lang.startsWith("en") && voice.name.includes("Google")) ??
    voices.find((voice) => voice.lang.startsWith("en-US")) ??
    voices.find((voice) => voice.lang.startsWith("en")) ??
    voices[0] ??
    null
  );
}

/**
 * Wraps the Web Speech API. High-priority messages interrupt whatever is being said; normal
 * messages are dropped while speech is in progress.
 */
export class VoiceManager {
  private readonly speech: SpeechPort | null;
  private readonly settings: VoiceSettings;
  private voice: SpeechSynthesisVoice | null = null;
  private enabled = true;

  constructor(speech: SpeechPort | null = browserSpeech(), settings: VoiceSettings = DEFAULT_VOICE_SETTINGS) {
    this.speech = speech;
    this.settings = settings;
  }

  isSupported(): boolean {
    return this.speech !== null;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
    if (!enabled) {
      this.stop();
    }
  }

  speak(text: string, priority: SpeechPriority = "normal"): boolean {
    if (!this.enabled || !this.speech || !text.trim()) {
      return false;
    }

    if (this.speech.speaking) {
      if (priority === "normal") {
        console.info("[Voice] Already speaking, skipping");
        return false;
      }
      this.speech.cancel();
    }

    if (!this.voice) {
      this.voice = pickVoice(this.speech.getVoices());
    }

    try {
      const utterance = new SpeechSynthesisUtterance(text);
      utterance.rate = this.settings.rate;
      utterance.pitch = this.settings.pitch;
      utterance.volume = this.settings.volume;
      if (this.voice) {
        utterance.voice = this.voice;
      }
      utterance.onerror = (event) => {
        console.error("[Voice] Error:", event.error);
      };
      this.speech.speak(utterance);
      return true;
    } catch (error) {
      console.error("[Voice] Speak failed:", error);
      return false;
    }
  }

  stop() {
    this.speech?.cancel();
  }
}
