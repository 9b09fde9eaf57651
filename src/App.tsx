/**
 * CareVault Mobile — Root App Component
 *
 * Owns the app-ready flag: splash until it flips, then a two-panel
 * swipe shell (VAULT, PROFILE) with a dot indicator.
 */

import React, { useRef, useState, useCallback, useEffect } from 'react';
import {
    View,
    StyleSheet,
    ScrollView,
    StatusBar,
    TouchableOpacity,
    type NativeSyntheticEvent,
    type NativeScrollEvent,
    Platform,
    useWindowDimensions,
} from 'react-native';
import Animated, { FadeIn } from 'react-native-reanimated';
import { SplashScreen, VaultScreen, ProfileScreen } from './screens';
import { SessionService, HapticService } from './services';
import { APP_CONFIG } from './config';
import { colors, moderateScale } from './theme';
import type { PanelName } from './types';

interface Panel {
    key: PanelName;
    component: React.ReactNode;
}

const PANELS: Panel[] = [
    { key: 'VAULT', component: <VaultScreen /> },
    { key: 'PROFILE', component: <ProfileScreen /> },
];

export const App: React.FC = () => {
    const [isAppReady, setIsAppReady] = useState(false);

    useEffect(() => {
        void SessionService.restore();
    }, []);

    // Flips once; nothing resets it
    const handleSplashReady = useCallback(() => {
        setIsAppReady(true);
    }, []);

    if (!isAppReady) {
        return <SplashScreen onReady={handleSplashReady} />;
    }

    return <MainShell />;
};

const MainShell: React.FC = () => {
    const { width: screenWidth } = useWindowDimensions();
    const scrollViewRef = useRef<ScrollView>(null);
    const [currentPanel, setCurrentPanel] = useState<PanelName>('VAULT');
    const [panelHeight, setPanelHeight] = useState(0);

    const handleScrollEnd = useCallback(
        (event: NativeSyntheticEvent<NativeScrollEvent>) => {
            const index = Math.round(event.nativeEvent.contentOffset.x / screenWidth);
            const panel = PANELS[index];
            if (panel) {
                setCurrentPanel(panel.key);
            }
        },
        [screenWidth]
    );

    const scrollToPanel = (index: number) => {
        HapticService.select();
        scrollViewRef.current?.scrollTo({ x: index * screenWidth, animated: true });
        setCurrentPanel(PANELS[index].key);
    };

    const currentIndex = PANELS.findIndex(p => p.key === currentPanel);

    return (
        <Animated.View
            style={styles.container}
            entering={FadeIn.duration(APP_CONFIG.splash.fadeInMs)}
        >
            <StatusBar barStyle="dark-content" backgroundColor={colors.background} />

            {/* Panel content */}
            <View
                style={styles.contentContainer}
                onLayout={(e) => setPanelHeight(e.nativeEvent.layout.height)}
            >
                {panelHeight > 0 && (
                    <ScrollView
                        ref={scrollViewRef}
                        horizontal
                        pagingEnabled
                        showsHorizontalScrollIndicator={false}
                        bounces={false}
                        onMomentumScrollEnd={handleScrollEnd}
                        scrollEventThrottle={16}
                        nestedScrollEnabled
                    >
                        {PANELS.map((panel) => (
                            <View key={panel.key} style={{ width: screenWidth, height: panelHeight }}>
                                {panel.component}
                            </View>
                        ))}
                    </ScrollView>
                )}
            </View>

            {/* Dot indicator */}
            <View style={styles.navContainer}>
                <View style={styles.dotsRow}>
                    {PANELS.map((panel, index) => (
                        <TouchableOpacity
                            key={panel.key}
                            onPress={() => scrollToPanel(index)}
                            style={styles.dotTouch}
                            activeOpacity={0.7}
                            accessibilityLabel={panel.key === 'VAULT' ? 'Vault' : 'Profile'}
                        >
                            <View style={[styles.dot, currentIndex === index && styles.dotActive]} />
                        </TouchableOpacity>
                    ))}
                </View>
            </View>
        </Animated.View>
    );
};

const STATUSBAR_HEIGHT = Platform.OS === 'android' ? StatusBar.currentHeight ?? 24 : 0;

const styles = StyleSheet.create({
    container: {
        flex: 1,
        backgroundColor: colors.background,
        paddingTop: STATUSBAR_HEIGHT,
    },
    contentContainer: {
        flex: 1,
    },

    navContainer: {
        backgroundColor: colors.surface,
        paddingBottom: moderateScale(28),
        paddingTop: moderateScale(12),
        borderTopWidth: StyleSheet.hairlineWidth,
        borderTopColor: colors.border,
    },
    dotsRow: {
        flexDirection: 'row',
        justifyContent: 'center',
        alignItems: 'center',
        gap: moderateScale(12),
    },
    dotTouch: {
        padding: moderateScale(8),
    },
    dot: {
        width: moderateScale(6),
        height: moderateScale(6),
        borderRadius: moderateScale(3),
        backgroundColor: colors.textMuted,
        opacity: 0.5,
    },
    dotActive: {
        backgroundColor: colors.accentPrimary,
        opacity: 1,
        width: moderateScale(8),
        height: moderateScale(8),
        borderRadius: moderateScale(4),
    },
});

export default App;
