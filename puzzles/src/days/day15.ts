import { parseGrid, scaleGrid } from '../risk_core/grid';
import { findMinCostPath } from '../risk_core/search';
import { type Answers, type DriverIO, runDay } from './driver';

export function solve(text: string): Answers {
  const grid = parseGrid(text);
  return {
    part1: findMinCostPath(grid),
    part2: findMinCostPath(scaleGrid(grid, 5))
  };
}

export function main(argv: string[] = process.argv.slice(2), io?: DriverIO): number {
  return runDay(15, solve, argv, io);
}

if (require.main === module) process.exitCode = main();
