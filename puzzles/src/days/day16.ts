import { decodeHex } from '../packet_core/decode';
import { evaluate, versionSum } from '../packet_core/evaluate';
import { type Answers, type DriverIO, runDay } from './driver';

export function solve(text: string): Answers {
  const { packet } = decodeHex(text);
  return { part1: versionSum(packet), part2: evaluate(packet) };
}

export function main(argv: string[] = process.argv.slice(2), io?: DriverIO): number {
  return runDay(16, solve, argv, io);
}

if (require.main === module) process.exitCode = main();
