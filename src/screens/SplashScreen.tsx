/**
 * Splash — Launch Screen
 *
 * Logo springs in, background orbs breathe, and after a fixed delay the
 * host is told the app is ready. Navigation belongs to the host.
 */

import React from 'react';
import { View, Text, StyleSheet, StatusBar } from 'react-native';
import Animated, { interpolate, useAnimatedStyle } from 'react-native-reanimated';
import { useSplashSequence } from '../hooks/useSplashSequence';
import { APP_CONFIG } from '../config';
import { borderRadius, colors, iconGlyph, moderateScale, splashPalette, typography } from '../theme';

interface SplashScreenProps {
    onReady: () => void;
}

export const SplashScreen: React.FC<SplashScreenProps> = ({ onReady }) => {
    const { entrance, pulse } = useSplashSequence(onReady);

    const logoStyle = useAnimatedStyle(() => ({
        opacity: entrance.value,
        transform: [{ scale: interpolate(entrance.value, [0, 1], [0.5, 1]) }],
    }));

    const titleStyle = useAnimatedStyle(() => ({
        opacity: entrance.value,
        transform: [{ translateY: interpolate(entrance.value, [0, 1], [50, 0]) }],
    }));

    const topOrbStyle = useAnimatedStyle(() => ({
        transform: [{ scale: interpolate(pulse.value, [0, 1], [1, 1.2]) }],
    }));

    const bottomOrbStyle = useAnimatedStyle(() => ({
        transform: [{ scale: interpolate(pulse.value, [0, 1], [1, 1.3]) }],
    }));

    return (
        <View style={styles.container}>
            <StatusBar barStyle="light-content" backgroundColor={splashPalette.royalBlue} />

            {/* Layered backdrop in place of a gradient */}
            <View style={[StyleSheet.absoluteFill, styles.backdropIndigo]} />
            <View style={[StyleSheet.absoluteFill, styles.backdropCyan]} />

            <Animated.View style={[styles.orb, styles.orbTop, topOrbStyle]} />
            <Animated.View style={[styles.orb, styles.orbBottom, bottomOrbStyle]} />

            <Animated.View style={[styles.logoTile, logoStyle]}>
                <Text style={styles.logoGlyph}>{iconGlyph('cross.case.fill')}</Text>
            </Animated.View>

            <Animated.View style={[styles.titleBlock, titleStyle]}>
                <Text style={styles.brand}>{APP_CONFIG.appName}</Text>
                <Text style={styles.tagline}>{APP_CONFIG.tagline}</Text>
            </Animated.View>
        </View>
    );
};

const LOGO_SIZE = moderateScale(140);

const styles = StyleSheet.create({
    container: {
        flex: 1,
        alignItems: 'center',
        justifyContent: 'center',
        backgroundColor: splashPalette.royalBlue,
        overflow: 'hidden',
    },
    backdropIndigo: {
        backgroundColor: splashPalette.indigo,
        opacity: 0.55,
        top: '35%',
    },
    backdropCyan: {
        backgroundColor: splashPalette.cyan,
        opacity: 0.45,
        top: '70%',
    },

    orb: {
        position: 'absolute',
        borderRadius: borderRadius.full,
    },
    orbTop: {
        width: 300,
        height: 300,
        backgroundColor: splashPalette.orbBlue,
        top: '10%',
        left: -40,
    },
    orbBottom: {
        width: 250,
        height: 250,
        backgroundColor: splashPalette.orbCyan,
        bottom: '12%',
        right: -30,
    },

    logoTile: {
        width: LOGO_SIZE,
        height: LOGO_SIZE,
        borderRadius: 40,
        alignItems: 'center',
        justifyContent: 'center',
        backgroundColor: splashPalette.glassFill,
        borderWidth: 1,
        borderColor: splashPalette.glassStroke,
    },
    logoGlyph: {
        fontSize: moderateScale(60),
        color: colors.textOnDark,
    },

    titleBlock: {
        alignItems: 'center',
        marginTop: moderateScale(20),
        gap: moderateScale(5),
    },
    brand: {
        ...typography.brand,
        color: colors.textOnDark,
        textShadowColor: 'rgba(0, 0, 0, 0.2)',
        textShadowOffset: { width: 0, height: 5 },
        textShadowRadius: 5,
    },
    tagline: {
        ...typography.tagline,
        color: 'rgba(255, 255, 255, 0.8)',
    },
});

export default SplashScreen;
