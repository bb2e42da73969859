import type { SoundCue } from './sound-cues';

type AudioContextConstructor = new () => AudioContext;

interface Tone {
  freq: number;
  endFreq?: number;
  type: OscillatorType;
  duration: number;
  volume: number;
  delay?: number;
}

const CUES: Record<SoundCue, Tone[]> = {
  step: [{ freq: 150, endFreq: 60, type: 'sine', duration: 0.1, volume: 0.1 }],
  rock: [{ freq: 110, endFreq: 50, type: 'square', duration: 0.25, volume: 0.15 }],
  paper: [{ freq: 600, endFreq: 900, type: 'sine', duration: 0.2, volume: 0.08 }],
  scissors: [
    { freq: 1200, type: 'triangle', duration: 0.06, volume: 0.1 },
    { freq: 1400, type: 'triangle', duration: 0.06, volume: 0.1, delay: 0.08 },
  ],
  clash: [{ freq: 300, endFreq: 100, type: 'sawtooth', duration: 0.35, volume: 0.15 }],
  timeout: [
    { freq: 440, type: 'sine', duration: 0.15, volume: 0.1 },
    { freq: 330, type: 'sine', duration: 0.25, volume: 0.1, delay: 0.18 },
  ],
  victory: [
    { freq: 523.25, type: 'sine', duration: 0.15, volume: 0.1 },
    { freq: 659.25, type: 'sine', duration: 0.15, volume: 0.1, delay: 0.15 },
    { freq: 783.99, type: 'sine', duration: 0.4, volume: 0.1, delay: 0.3 },
  ],
  draw: [
    { freq: 392, type: 'triangle', duration: 0.3, volume: 0.1 },
    { freq: 392, type: 'triangle', duration: 0.3, volume: 0.1, delay: 0.35 },
  ],
};

function findAudioContext(): AudioContextConstructor | null {
  if (typeof window === 'undefined') return null;
  return window.AudioContext ?? null;
}

/** Synthesized cues; no audio assets. The context is created on first use. */
export class SoundManager {
  private ctx: AudioContext | null = null;
  private enabled = true;

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  play(cue: SoundCue): void {
    const ctx = this.getContext();
    if (!ctx) return;
    for (const tone of CUES[cue]) {
      this.playTone(ctx, tone);
    }
  }

  private getContext(): AudioContext | null {
    if (!this.enabled) return null;
    if (!this.ctx) {
      const AudioContextClass = findAudioContext();
      if (!AudioContextClass) return null;
      this.ctx = new AudioContextClass();
    }
    if (this.ctx.state === 'suspended') {
      this.ctx.resume().catch((e: unknown) => {
        console.warn('Audio context could not be resumed:', e);
      });
    }
    return this.ctx;
  }

  private playTone(ctx: AudioContext, tone: Tone): void {
    const start = ctx.currentTime + (tone.delay ?? 0);
    const osc = ctx.createOscillator();
    const gain = ctx.createGain();

    osc.type = tone.type;
    osc.frequency.setValueAtTime(tone.freq, start);
    if (tone.endFreq !== undefined) {
      osc.frequency.exponentialRampToValueAtTime(tone.endFreq, start + tone.duration);
    }

    gain.gain.setValueAtTime(tone.volume, start);
    gain.gain.exponentialRampToValueAtTime(0.01, start + tone.duration);

    osc.connect(gain);
    gain.connect(ctx.destination);
    osc.start(start);
    osc.stop(start + tone.duration);
  }
}

export const soundManager = new SoundManager();
