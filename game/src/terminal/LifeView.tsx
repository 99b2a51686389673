import { Box, Text, useInput } from 'ink';
import { instructionLine } from './frame';

export type LifeViewProps = {
  rows: string[];
  generation: number;
  // board width in columns; the instruction line is cut to fit it
  width?: number;
  onQuit: () => void;
};

export function LifeView({ rows, generation, width, onQuit }: LifeViewProps) {
  useInput((input, key) => {
    if (input === 'q' || (key.ctrl && input === 'c')) onQuit();
  });

  return (
    <Box flexDirection="column" width={width}>
      {rows.map((line, i) => (
        <Text key={i}>{line}</Text>
      ))}
      <Text dimColor wrap="truncate">
        {instructionLine(generation)}
      </Text>
    </Box>
  );
}
