import {
  Attributes,
  ChunkSpec,
  Coordinates,
  DataValue,
  DimensionName,
  IndexRange,
  IndexRanges
} from '../types.js';
import { arraysEqual, computeStrides, copyCoords, isMissing, sizeOf, unravelIndex } from '../utils.js';
import {
  createEagerBlock,
  createLazyBlock,
  isLazyBlock,
  resolveRegion,
  type DataBlock
} from '../core/data-block.js';
import { normalizeChunks } from '../core/chunks.js';
import { ShapeMismatchError, describeCoordinateMismatch } from '../errors.js';

export interface ArrayOperand {
  kind: 'array';
  block: DataBlock;
  dims: DimensionName[];
  coords: Coordinates;
  attrs?: Attributes;
  name?: string;
  chunks?: ChunkSpec;
}

export interface ScalarOperand {
  kind: 'scalar';
  value: DataValue;
}

export type Operand = ArrayOperand | ScalarOperand;

export interface WhereOptions {
  keepAttrs?: boolean;
  name?: string;
}

export interface BinaryOpOptions {
  keepAttrs?: boolean | 'left' | 'right';
  name?: string;
}

export interface ElementwiseResult {
  block: DataBlock;
  dims: DimensionName[];
  coords: Coordinates;
  chunks?: ChunkSpec;
  attrs?: Attributes;
  name?: string;
}

export function isArrayOperand(operand: Operand): operand is ArrayOperand {
  return operand.kind === 'array';
}

/**
 * Truthiness of a condition value: NaN and 0 are false
 */
export function isTruthy(value: DataValue): boolean {
  if (typeof value === 'boolean') return value;
  return value !== 0 && !isMissing(value);
}

export function computeWhere(
  cond: Operand,
  x: Operand,
  y: Operand,
  options?: WhereOptions
): ElementwiseResult {
  const result = computeElementwise([cond, x, y], ([c, xValue, yValue]) =>
    isTruthy(c) ? xValue : yValue
  );

  const attrs = options?.keepAttrs && isArrayOperand(x) && x.attrs ? { ...x.attrs } : undefined;
  const name = options?.name ?? firstName([x, y, cond]);

  return { ...result, attrs, name };
}

export function computeBinaryOp(
  left: Operand,
  right: Operand,
  operator: (leftValue: DataValue, rightValue: DataValue) => DataValue,
  options?: BinaryOpOptions
): ElementwiseResult {
  const result = computeElementwise([left, right], ([l, r]) => operator(l, r));

  return {
    ...result,
    attrs: resolveBinaryAttributes(left, right, options?.keepAttrs),
    name: options?.name ?? firstName([left, right])
  };
}

export function computeUnaryOp(
  operand: ArrayOperand,
  operator: (value: DataValue) => DataValue,
  options?: { keepAttrs?: boolean; name?: string }
): ElementwiseResult {
  const result = computeElementwise([operand], ([value]) => operator(value));
  return {
    ...result,
    attrs: options?.keepAttrs && operand.attrs ? { ...operand.attrs } : undefined,
    name: options?.name ?? operand.name
  };
}

interface BroadcastPlan {
  dims: DimensionName[];
  coords: Coordinates;
  shape: number[];
}

/**
 * Broadcast any number of operands by dimension name and apply `handler`
 * element-wise. Eager operands are evaluated immediately; if any operand is
 * lazy, the result is a lazy block that fetches only the operand regions
 * it is asked for.
 */
export function computeElementwise(
  operands: Operand[],
  handler: (values: DataValue[]) => DataValue
): ElementwiseResult {
  const plan = computeBroadcastPlan(operands);
  const arrays = operands.filter(isArrayOperand);
  const lazy = arrays.some(operand => isLazyBlock(operand.block));

  if (!lazy) {
    const inputs = operands.map(operand =>
      isArrayOperand(operand) && !isLazyBlock(operand.block)
        ? operand.block.materialize()
        : undefined
    );
    const region = plan.shape.map(size => ({ start: 0, stop: size }));
    const values = evaluateRegion(plan, region, operands, inputs, handler);
    return {
      block: createEagerBlock(values, plan.dims, plan.shape),
      dims: plan.dims,
      coords: plan.coords
    };
  }

  const block = createLazyBlock(plan.dims, plan.shape, async (ranges: IndexRanges) => {
    const region = resolveRegion(plan.dims, plan.shape, ranges);
    const inputs = await Promise.all(operands.map(operand => {
      if (!isArrayOperand(operand)) return Promise.resolve(undefined);
      const subRanges: IndexRanges = {};
      for (const dim of operand.dims) {
        subRanges[dim] = ranges[dim];
      }
      return operand.block.fetch(subRanges);
    }));
    return evaluateRegion(plan, region, operands, inputs, handler);
  });

  const chunked = arrays.find(operand => operand.chunks !== undefined);

  return {
    block,
    dims: plan.dims,
    coords: plan.coords,
    chunks: chunked?.chunks ? normalizeChunks(plan.dims, chunked.chunks) : undefined
  };
}

function computeBroadcastPlan(operands: Operand[]): BroadcastPlan {
  const arrays = operands.filter(isArrayOperand);
  const dims: DimensionName[] = [];
  const coords: Coordinates = {};

  // Lead with the highest-dimensional operand so that e.g. a {y, x} mask
  // applied to a {time, y, x} band keeps the band's axis order.
  const ordered = [...arrays].sort((a, b) => b.dims.length - a.dims.length);

  for (const operand of ordered) {
    for (const dim of operand.dims) {
      const operandCoords = operand.coords[dim];
      if (!operandCoords) {
        throw new ShapeMismatchError(`Missing coordinates for dimension '${dim}'`);
      }
      const existing = coords[dim];
      if (!existing) {
        dims.push(dim);
        coords[dim] = operandCoords;
      } else if (!arraysEqual(existing, operandCoords)) {
        throw new ShapeMismatchError(describeCoordinateMismatch(dim, existing, operandCoords));
      }
    }
  }

  return {
    dims,
    coords: copyCoords(coords),
    shape: dims.map(dim => coords[dim].length)
  };
}

function evaluateRegion(
  plan: BroadcastPlan,
  region: readonly IndexRange[],
  operands: readonly Operand[],
  inputs: ReadonlyArray<readonly DataValue[] | undefined>,
  handler: (values: DataValue[]) => DataValue
): DataValue[] {
  const regionShape = region.map(r => r.stop - r.start);
  const total = sizeOf(regionShape);

  // For each operand, the stride to apply to each result axis (0 when the
  // operand does not carry that axis, i.e. it is broadcast along it).
  const axisStrides = operands.map(operand => {
    if (!isArrayOperand(operand)) return [];
    const operandShape = operand.dims.map(dim => regionShape[plan.dims.indexOf(dim)]);
    const strides = computeStrides(operandShape);
    return plan.dims.map(dim => {
      const position = operand.dims.indexOf(dim);
      return position === -1 ? 0 : strides[position];
    });
  });

  const result = new Array<DataValue>(total);
  const scratch = new Array<DataValue>(operands.length);

  for (let flat = 0; flat < total; flat++) {
    const indices = unravelIndex(flat, regionShape);
    for (let k = 0; k < operands.length; k++) {
      const operand = operands[k];
      if (!isArrayOperand(operand)) {
        scratch[k] = operand.value;
        continue;
      }
      const values = inputs[k];
      if (!values) {
        throw new Error('Operand values were not fetched');
      }
      const strides = axisStrides[k];
      let offset = 0;
      for (let axis = 0; axis < indices.length; axis++) {
        offset += indices[axis] * strides[axis];
      }
      scratch[k] = values[offset];
    }
    result[flat] = handler(scratch);
  }

  return result;
}

function firstName(operands: Operand[]): string | undefined {
  for (const operand of operands) {
    if (isArrayOperand(operand) && operand.name) return operand.name;
  }
  return undefined;
}

function resolveBinaryAttributes(
  left: Operand,
  right: Operand,
  keepAttrs?: BinaryOpOptions['keepAttrs']
): Attributes | undefined {
  if (!keepAttrs) return undefined;

  const source = keepAttrs === 'right' ? right : left;
  return isArrayOperand(source) && source.attrs ? { ...source.attrs } : undefined;
}
