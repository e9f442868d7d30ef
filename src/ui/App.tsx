import { useEffect, useState, useSyncExternalStore } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import type { AppConfig } from '@/core/config/AppConfig';
import { Logger } from '@/core/utils/Logger';
import type { InkRenderer } from './InkRenderer';
import { LyricsPane } from './LyricsPane';
import { statusBar } from './format';
import { pageSize } from './viewport';

export type DisplayOptions = Pick<AppConfig, 'center' | 'limitHeight' | 'color' | 'colorCurrent'>;

interface AppProps {
    renderer: InkRenderer;
    display: DisplayOptions;
}

const STATUS_ROWS = 1;
const FALLBACK_ROWS = 24;

function useTerminalRows(): number {
    const { stdout } = useStdout();
    const [rows, setRows] = useState(stdout.rows || FALLBACK_ROWS);

    useEffect(() => {
        const onResize = () => setRows(stdout.rows || FALLBACK_ROWS);
        stdout.on('resize', onResize);
        return () => {
            stdout.off('resize', onResize);
        };
    }, [stdout]);

    return rows;
}

export default function App({ renderer, display }: AppProps) {
    const frame = useSyncExternalStore(renderer.subscribe, renderer.getFrame);
    const [warning, setWarning] = useState<string | undefined>(undefined);
    const { exit } = useApp();

    const rows = useTerminalRows();
    const height = Math.max(1, rows - STATUS_ROWS);
    const visibleRows = display.limitHeight === undefined ? height : Math.min(display.limitHeight, height);

    // Latest warning goes to the status bar; cleared on the next track
    useEffect(() => {
        return Logger.subscribe((entry) => {
            if (entry.level === 'warn' || entry.level === 'error') setWarning(entry.message);
        });
    }, []);

    useEffect(() => {
        setWarning(undefined);
    }, [frame.track]);

    useInput((input, key) => {
        if (input === 'q') {
            exit();
        } else if (key.upArrow) {
            renderer.scroll(-1);
        } else if (key.downArrow) {
            renderer.scroll(1);
        } else if (key.pageUp) {
            renderer.scroll(-pageSize(visibleRows));
        } else if (key.pageDown) {
            renderer.scroll(pageSize(visibleRows));
        }
    });

    return (
        <Box flexDirection="column" height={rows}>
            <LyricsPane
                frame={frame}
                height={height}
                visibleRows={visibleRows}
                center={display.center}
                color={display.color}
                colorCurrent={display.colorCurrent}
            />
            <Text dimColor wrap="truncate-end">{statusBar(frame, warning)}</Text>
        </Box>
    );
}
