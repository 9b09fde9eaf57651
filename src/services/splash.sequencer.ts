/**
 * Splash Sequencer — Timed Launch Transition
 *
 * Starts the splash entrance and background pulse, then reports "ready"
 * once after a fixed delay. Owned by a single splash view; disposing it
 * before the delay elapses makes the pending transition a no-op.
 */

import { APP_CONFIG } from '../config';
import type { SplashPhase } from '../types';

export interface SplashAnimationDriver {
    /** Scale/opacity entrance, runs to completion on its own */
    runEntrance(): void;
    /** Infinite reversing pulse on the background decoration */
    startPulse(): void;
    stopPulse(): void;
}

export interface SplashSequencerOptions {
    driver: SplashAnimationDriver;
    onReady: () => void;
    delayMs?: number;
}

export class SplashSequencer {
    private readonly driver: SplashAnimationDriver;
    private readonly onReady: () => void;
    private readonly delayMs: number;

    private phase: SplashPhase = 'idle';
    private mounted: boolean = true;
    private readyTimer: ReturnType<typeof setTimeout> | null = null;

    constructor({ driver, onReady, delayMs = APP_CONFIG.splash.readyDelayMs }: SplashSequencerOptions) {
        this.driver = driver;
        this.onReady = onReady;
        this.delayMs = delayMs;
    }

    getPhase(): SplashPhase {
        return this.phase;
    }

    isMounted(): boolean {
        return this.mounted;
    }

    /**
     * Kick off both animations and schedule the ready transition.
     * Fire-once: later calls are ignored.
     */
    start(): void {
        if (!this.mounted) {
            console.warn('[SplashSequencer] start() after dispose, ignoring');
            return;
        }
        if (this.phase !== 'idle') {
            console.warn(`[SplashSequencer] start() while ${this.phase}, ignoring`);
            return;
        }

        this.phase = 'transitioning';

        this.runAnimation('entrance', () => this.driver.runEntrance());
        this.runAnimation('pulse', () => this.driver.startPulse());

        this.readyTimer = setTimeout(() => this.complete(), this.delayMs);
    }

    /**
     * Detach from the view. Safe to call more than once.
     */
    dispose(): void {
        if (!this.mounted) return;
        this.mounted = false;

        if (this.readyTimer) {
            clearTimeout(this.readyTimer);
            this.readyTimer = null;
        }

        if (this.phase !== 'idle') {
            this.runAnimation('pulse stop', () => this.driver.stopPulse());
        }
    }

    private complete(): void {
        this.readyTimer = null;

        // View went away between scheduling and firing
        if (!this.mounted) return;

        this.phase = 'ready';
        console.log('[SplashSequencer] Ready after', this.delayMs, 'ms');
        this.onReady();
    }

    private runAnimation(name: string, run: () => void): void {
        try {
            run();
        } catch (error) {
            console.warn(`[SplashSequencer] ${name} animation failed:`, error);
        }
    }
}
