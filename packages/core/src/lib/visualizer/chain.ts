/**
 * Visualizer chain.
 *
 * Registration order is dispatch priority: protocol-specific visualizers
 * first, the declarative engine adapter next, the raw fallback last.
 */

import { logger } from "../logger";
import type { PayloadField } from "../payload";
import { visualizeWithAny } from "./dispatch";
import type { Visualizer, VisualizerContext } from "./types";

export interface VisualizeAllOptions<TElement, TInput> {
  sender: string;
  elements: readonly TElement[];
  inputs?: readonly TInput[];
  chainId?: number;
}

export class VisualizerChain<TElement, TInput = never> {
  readonly visualizers: readonly Visualizer<TElement, TInput>[];

  constructor(visualizers: readonly Visualizer<TElement, TInput>[]) {
    this.visualizers = Object.freeze([...visualizers]);
    Object.freeze(this);
  }

  names(): string[] {
    return this.visualizers.map((visualizer) => visualizer.name);
  }

  visualize(context: VisualizerContext<TElement, TInput>): PayloadField | null {
    return visualizeWithAny(this.visualizers, context);
  }

  /** Visualize every element; unclaimed elements map to null. */
  visualizeAll(options: VisualizeAllOptions<TElement, TInput>): Array<PayloadField | null> {
    const { sender, elements, inputs = [], chainId } = options;
    return elements.map((_, index) =>
      this.visualize({ sender, elements, inputs, index, ...(chainId !== undefined && { chainId }) })
    );
  }
}

export interface BuildChainOptions {
  /** Visualizer names to leave out. Unknown names are ignored. */
  disabled?: readonly string[];
}

export class VisualizerChainBuilder<TElement, TInput = never> {
  private readonly visualizers: Visualizer<TElement, TInput>[] = [];

  register(visualizer: Visualizer<TElement, TInput>): this {
    if (this.visualizers.some((existing) => existing.name === visualizer.name)) {
      throw new Error(`Visualizer "${visualizer.name}" is already registered`);
    }
    this.visualizers.push(visualizer);
    return this;
  }

  build(options: BuildChainOptions = {}): VisualizerChain<TElement, TInput> {
    const disabled = new Set(options.disabled ?? []);
    const enabled = this.visualizers.filter((visualizer) => !disabled.has(visualizer.name));
    if (enabled.length !== this.visualizers.length) {
      logger.debug(
        { disabled: this.visualizers.filter((v) => disabled.has(v.name)).map((v) => v.name) },
        "visualizers disabled"
      );
    }
    return new VisualizerChain(enabled);
  }
}
