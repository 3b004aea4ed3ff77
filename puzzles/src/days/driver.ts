import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describeError, isAppError } from '@daily-puzzles/shared';
import { REGISTRY, getDay } from './registry';

export type Answers = { part1: number | bigint; part2: number | bigint };

export type DriverIO = {
  read: (path: string) => string;
  out: (line: string) => void;
  err: (line: string) => void;
};

export const INPUT_DIR = join(__dirname, '..', '..', 'input');

const defaultIO: DriverIO = {
  read: (path) => readFileSync(path, 'utf8'),
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

// Input is the first argument, else the day's file under INPUT_DIR.
// Returns the process exit code.
export function runDay(
  id: number,
  solve: (text: string) => Answers,
  argv: string[] = process.argv.slice(2),
  io: DriverIO = defaultIO
): number {
  try {
    const path = argv[0] ?? join(INPUT_DIR, getDay(REGISTRY, id).inputFile);
    const { part1, part2 } = solve(io.read(path));
    io.out(`part1: ${part1}`);
    io.out(`part2: ${part2}`);
    return 0;
  } catch (e) {
    io.err(describeError(e));
    return isAppError(e) ? e.exitCode : 1;
  }
}
