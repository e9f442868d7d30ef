import { Box, Text } from 'ink';
import type { RenderFrame } from '@/core/models/RenderFrame';
import { paneRows } from './viewport';
import { ansiColor, statusMessage } from './format';

interface LyricsPaneProps {
    frame: RenderFrame;
    /** Rows available for lyrics. */
    height: number;
    /** Rows actually drawn; smaller than `height` with --limit-height. */
    visibleRows: number;
    center: boolean;
    color: number;
    colorCurrent: number;
}

export function LyricsPane({ frame, height, visibleRows, center, color, colorCurrent }: LyricsPaneProps) {
    const message = statusMessage(frame.status);
    const align = center ? 'center' : 'flex-start';

    if (message !== null) {
        return (
            <Box height={height} flexDirection="column" justifyContent="center" alignItems={align}>
                <Text dimColor>{message}</Text>
            </Box>
        );
    }

    return (
        <Box
            height={height}
            flexDirection="column"
            justifyContent={visibleRows < height ? 'center' : 'flex-start'}
            alignItems={align}
        >
            {paneRows(frame.lines, frame.offset, frame.mode, visibleRows).map(row => (
                <Text
                    key={row.index}
                    wrap="truncate-end"
                    bold={row.emphasis === 'current'}
                    underline={row.emphasis === 'cursor'}
                    color={ansiColor(row.emphasis === 'none' ? color : colorCurrent)}
                >
                    {row.text === '' ? ' ' : row.text}
                </Text>
            ))}
        </Box>
    );
}
