import { RankExceededError } from "./Errors.js";

export const MAX_SUPPORTED_RANK = 5;
export const SHAPE_ARRAY_SIZE = MAX_SUPPORTED_RANK - 1;

/** Fixed-length shape as the device sees it: four dims, outermost first. */
export type ShapeDescriptor = readonly [number, number, number, number];

/**
 * Encodes a shape of rank 0..5 into a descriptor.
 * The last four dims are right-aligned and padded with 1; a fifth,
 * outermost dim is folded into the leading slot.
 */
export function encodeShape(dims: readonly number[], nodeName?: string): ShapeDescriptor {
    if (dims.length > MAX_SUPPORTED_RANK) {
        throw new RankExceededError(dims.length, MAX_SUPPORTED_RANK, nodeName);
    }
    const padded = [...Array<number>(Math.max(0, SHAPE_ARRAY_SIZE - dims.length)).fill(1), ...dims];
    const folded = padded.length - SHAPE_ARRAY_SIZE;
    const lead = padded.slice(0, folded + 1).reduce((a, b) => a * b, 1);
    return [lead, padded[folded + 1], padded[folded + 2], padded[folded + 3]];
}

export function descriptorsEqual(a: ShapeDescriptor, b: ShapeDescriptor): boolean {
    return a.every((d, i) => d === b[i]);
}

export function descriptorElementCount(shape: ShapeDescriptor): number {
    return shape[0] * shape[1] * shape[2] * shape[3];
}

export function formatDescriptor(shape: ShapeDescriptor): string {
    return shape.join("x");
}
