import React from 'react';
import { View, StyleSheet, Platform, type StyleProp, type ViewStyle } from 'react-native';
import { BlurView } from '@react-native-community/blur';
import { borderRadius, colors } from '../theme';

interface GlassViewProps {
    children: React.ReactNode;
    style?: StyleProp<ViewStyle>;
    radius?: number;
}

// Used when the platform blur is unavailable
const FALLBACK_FILL = 'rgba(255, 255, 255, 0.92)';

export const GlassView: React.FC<GlassViewProps> = ({
    children,
    style,
    radius = borderRadius.lg,
}) => (
    <View style={[styles.container, { borderRadius: radius }, style]}>
        <BlurView
            style={StyleSheet.absoluteFill}
            blurType="xlight"
            blurAmount={20}
            reducedTransparencyFallbackColor={FALLBACK_FILL}
        />
        <View style={styles.content}>{children}</View>
    </View>
);

const styles = StyleSheet.create({
    container: {
        overflow: 'hidden',
        borderWidth: StyleSheet.hairlineWidth,
        borderColor: colors.border,
        backgroundColor: FALLBACK_FILL,
        ...Platform.select({
            android: {
                elevation: 4,
            },
            ios: {
                shadowColor: '#000',
                shadowOffset: { width: 0, height: 6 },
                shadowOpacity: 0.08,
                shadowRadius: 12,
            },
        }),
    },
    content: {
        zIndex: 1,
    },
});
