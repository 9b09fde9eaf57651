/**
 * Haptic Feedback Service
 */

import { Vibration, Platform } from 'react-native';

type FeedbackType = 'tap' | 'select' | 'warning';

const PATTERNS: Record<FeedbackType, number | number[]> = {
    tap: 10,
    select: 5,
    warning: [0, 40, 60, 40],
};

class HapticServiceClass {
    /**
     * Android only; iOS buttons rely on system feedback
     */
    trigger(type: FeedbackType): void {
        if (Platform.OS !== 'android') return;
        Vibration.vibrate(PATTERNS[type]);
    }

    tap(): void {
        this.trigger('tap');
    }

    select(): void {
        this.trigger('select');
    }

    warning(): void {
        this.trigger('warning');
    }
}

export const HapticService = new HapticServiceClass();

export default HapticService;
