/**
 * useSplashSequence Hook — Splash Animations + Ready Timer
 *
 * Binds a SplashSequencer to Reanimated shared values for the lifetime of
 * the splash view. The sequencer is disposed on unmount.
 */

import { useEffect, useRef } from 'react';
import {
    useSharedValue,
    withRepeat,
    withSpring,
    withTiming,
    cancelAnimation,
    Easing,
    type SharedValue,
} from 'react-native-reanimated';
import { SplashSequencer, type SplashAnimationDriver } from '../services/splash.sequencer';
import { APP_CONFIG } from '../config';

export interface SplashAnimationValues {
    /** 0 → 1, drives logo scale/opacity and title offset */
    entrance: SharedValue<number>;
    /** 0 ↔ 1 forever, drives the background orbs */
    pulse: SharedValue<number>;
}

export function useSplashSequence(onReady: () => void): SplashAnimationValues {
    const entrance = useSharedValue(0);
    const pulse = useSharedValue(0);

    // Latest callback without restarting the sequence
    const onReadyRef = useRef(onReady);
    onReadyRef.current = onReady;

    useEffect(() => {
        const driver: SplashAnimationDriver = {
            runEntrance: () => {
                entrance.value = withSpring(1, { damping: 12, stiffness: 90 });
            },
            startPulse: () => {
                pulse.value = withRepeat(
                    withTiming(1, {
                        duration: APP_CONFIG.splash.pulseLegMs,
                        easing: Easing.inOut(Easing.ease),
                    }),
                    -1,
                    true
                );
            },
            stopPulse: () => {
                cancelAnimation(pulse);
            },
        };

        const sequencer = new SplashSequencer({
            driver,
            onReady: () => onReadyRef.current(),
        });
        sequencer.start();

        return () => {
            sequencer.dispose();
        };
    }, [entrance, pulse]);

    return { entrance, pulse };
}
