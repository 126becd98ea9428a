/**
 * Visualizer dispatch types.
 *
 * A visualizer turns one element of a transaction (a call, a command, an
 * instruction) into a payload field. `TInput` is the transaction-wide input
 * list some encodings index into, e.g. Move pure inputs.
 */

import type { PayloadField } from "../payload";

export interface VisualizerContext<TElement, TInput = never> {
  readonly chainId?: number;
  readonly sender: string;
  /** Position of the element being visualized. */
  readonly index: number;
  readonly elements: readonly TElement[];
  readonly inputs: readonly TInput[];
}

export interface Visualizer<TElement, TInput = never> {
  /** Stable identifier; settings disable visualizers by name. */
  readonly name: string;
  canHandle(element: TElement, context: VisualizerContext<TElement, TInput>): boolean;
  visualize(context: VisualizerContext<TElement, TInput>): PayloadField | null;
}

/** The element under `context.index`, or null when out of range. */
export function currentElement<TElement, TInput>(context: VisualizerContext<TElement, TInput>): TElement | null {
  const { index, elements } = context;
  return Number.isInteger(index) && index >= 0 && index < elements.length ? elements[index] : null;
}
