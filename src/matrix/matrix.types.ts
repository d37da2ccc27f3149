/**
 * Build matrix shapes.
 * An axis is one dimension of variation (e.g. platform x toolchain channel);
 * each of its entries binds a set of variables under a label.
 */
export type Variables = Readonly<Record<string, string>>;

export interface AxisEntry {
  /** Unique within its axis; becomes (part of) the lane id */
  readonly label: string;
  readonly variables: Variables;
}

export interface AxisDefinition {
  readonly name: string;
  readonly entries: readonly AxisEntry[];
}

/**
 * One concrete combination of axis entries: an independent execution unit.
 */
export interface Lane {
  /** Entry labels joined with '/' (just the label for a single axis) */
  readonly id: string;
  /** axis name -> entry label */
  readonly labels: Readonly<Record<string, string>>;
  readonly variables: Variables;
  /** Worker image the lane must run on, resolved from the pool image template */
  readonly image: string;
}

export interface ExpandMatrixOptions {
  /** Defaults to DEFAULT_IMAGE_TEMPLATE */
  imageTemplate?: string;
}

export const DEFAULT_IMAGE_TEMPLATE = '$(imageName)';
export const LANE_ID_SEPARATOR = '/';
