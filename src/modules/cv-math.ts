/**
 * CV-Math — f(a, b) · scale + offset over two control inputs.
 */

import { z } from 'zod';
import { Module } from './module';
import type { ModuleOptions } from './module';
import { Signal } from '../core/signal';
import { DIVIDE_EPSILON } from '../config';

export const CV_OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

export type CvOperation = (typeof CV_OPERATIONS)[number];

/** Divide keeps the denominator at least DIVIDE_EPSILON away from zero */
export function applyOperation(operation: CvOperation, a: number, b: number): number {
  switch (operation) {
    case 'add':
      return a + b;
    case 'subtract':
      return a - b;
    case 'multiply':
      return a * b;
    case 'divide': {
      const denominator = Math.abs(b) < DIVIDE_EPSILON ? (b < 0 ? -DIVIDE_EPSILON : DIVIDE_EPSILON) : b;
      return a / denominator;
    }
  }
}

const cvMathShape = {
  operation: z.enum(CV_OPERATIONS).default('add'),
  scale: z.number().default(1),
  offset: z.number().default(0),
};

export type CvMathShape = typeof cvMathShape;
export type CvMathOptions = ModuleOptions<CvMathShape>;

export class CvMath extends Module<CvMathShape> {
  readonly kind = 'cv-math';

  constructor(name: string, options: CvMathOptions = {}) {
    super(name, z.object(cvMathShape), options);
    this.addInput('input_a', 'cv');
    this.addInput('input_b', 'cv');
    this.addOutput('output', 'cv');
  }

  protected process(): void {
    const { operation, scale, offset } = this.params;
    const a = this.input('input_a');
    const b = this.input('input_b');

    this.emit(
      'output',
      new Signal((t) => {
        const value = applyOperation(operation, a.read(t), b.read(t)) * scale + offset;
        return Number.isFinite(value) ? value : 0;
      })
    );
  }
}
