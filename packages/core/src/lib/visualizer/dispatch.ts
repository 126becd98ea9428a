import { logger } from "../logger";
import type { PayloadField } from "../payload";
import { currentElement } from "./types";
import type { Visualizer, VisualizerContext } from "./types";

function attempt<TElement, TInput>(
  visualizer: Visualizer<TElement, TInput>,
  element: TElement,
  context: VisualizerContext<TElement, TInput>
): PayloadField | null {
  try {
    if (!visualizer.canHandle(element, context)) return null;
    return visualizer.visualize(context);
  } catch (err) {
    logger.debug(
      { visualizer: visualizer.name, index: context.index, err },
      "visualizer threw; treating as declined"
    );
    return null;
  }
}

/**
 * Try visualizers in priority order; the first non-null result wins.
 *
 * A visualizer that claims an element but produces nothing lets the next
 * one try. An out-of-range index yields null without asking anyone.
 */
export function visualizeWithAny<TElement, TInput>(
  visualizers: readonly Visualizer<TElement, TInput>[],
  context: VisualizerContext<TElement, TInput>
): PayloadField | null {
  const element = currentElement(context);
  if (element === null) return null;

  for (const visualizer of visualizers) {
    const field = attempt(visualizer, element, context);
    if (field) return field;
  }
  return null;
}
