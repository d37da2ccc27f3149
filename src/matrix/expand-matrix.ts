import {
  DEFAULT_IMAGE_TEMPLATE,
  LANE_ID_SEPARATOR,
  type AxisDefinition,
  type AxisEntry,
  type ExpandMatrixOptions,
  type Lane,
} from './matrix.types';
import { DuplicateLaneError, DuplicateVariableError, EmptyMatrixError } from './matrix.errors';
import { interpolate } from './interpolate';

/**
 * Reject duplicate labels inside an axis and variable names bound by more than one axis.
 */
function validateAxes(axes: readonly AxisDefinition[]): void {
  if (axes.length === 0) throw new EmptyMatrixError();

  const variableOwner = new Map<string, string>();

  for (const axis of axes) {
    if (axis.entries.length === 0) {
      throw new EmptyMatrixError(`axis '${axis.name}' has no entries`);
    }

    const labels = new Set<string>();
    const axisVariables = new Set<string>();
    for (const entry of axis.entries) {
      if (labels.has(entry.label)) throw new DuplicateLaneError(axis.name, entry.label);
      labels.add(entry.label);
      for (const name of Object.keys(entry.variables)) axisVariables.add(name);
    }

    for (const name of axisVariables) {
      const owner = variableOwner.get(name);
      if (owner !== undefined) throw new DuplicateVariableError(name, [owner, axis.name]);
      variableOwner.set(name, axis.name);
    }
  }
}

/**
 * Expand axes into lanes.
 * One lane per entry for a single axis; the Cartesian product (first axis outermost)
 * for several. Declaration order is preserved so logs line up run after run.
 */
export function expandMatrix(
  axes: readonly AxisDefinition[],
  options: ExpandMatrixOptions = {},
): Lane[] {
  validateAxes(axes);

  const imageTemplate = options.imageTemplate ?? DEFAULT_IMAGE_TEMPLATE;

  let combinations: AxisEntry[][] = [[]];
  for (const axis of axes) {
    const next: AxisEntry[][] = [];
    for (const prefix of combinations) {
      for (const entry of axis.entries) next.push([...prefix, entry]);
    }
    combinations = next;
  }

  return combinations.map((entries) => {
    const labels: Record<string, string> = {};
    const variables: Record<string, string> = {};
    entries.forEach((entry, axisIndex) => {
      labels[axes[axisIndex].name] = entry.label;
      Object.assign(variables, entry.variables);
    });

    return Object.freeze({
      id: entries.map((entry) => entry.label).join(LANE_ID_SEPARATOR),
      labels: Object.freeze(labels),
      variables: Object.freeze(variables),
      image: interpolate(imageTemplate, variables),
    });
  });
}
