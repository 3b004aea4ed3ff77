import { MalformedInputError } from '@daily-puzzles/shared';

export type DayConfig = {
  id: number;
  // file name under puzzles/input/
  inputFile: string;
};

export type DayRegistry = {
  days: DayConfig[];
};

export const REGISTRY: DayRegistry = {
  days: [
    { id: 15, inputFile: 'day15.txt' },
    { id: 16, inputFile: 'day16.txt' },
    { id: 18, inputFile: 'day18.txt' }
  ]
};

export function getDay(reg: DayRegistry, id: number): DayConfig {
  const d = reg.days.find((x) => x.id === id);
  if (!d) throw new MalformedInputError('DAY_NOT_FOUND:' + id);
  return d;
}
