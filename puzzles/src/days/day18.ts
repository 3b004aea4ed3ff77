import { parseSnailList } from '../snail_core/parse';
import { magnitude, maxPairMagnitude, sumAll } from '../snail_core/reduce';
import { type Answers, type DriverIO, runDay } from './driver';

export function solve(text: string): Answers {
  const list = parseSnailList(text);
  return {
    part1: magnitude(sumAll(list)),
    part2: maxPairMagnitude(list)
  };
}

export function main(argv: string[] = process.argv.slice(2), io?: DriverIO): number {
  return runDay(18, solve, argv, io);
}

if (require.main === module) process.exitCode = main();
