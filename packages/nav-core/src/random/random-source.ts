import type { RandomSource } from '@statenav/contracts';

export const mathRandomSource: RandomSource = {
  nextInt(min: number, max: number): number {
    return min + Math.floor(Math.random() * (max - min + 1));
  },
};
