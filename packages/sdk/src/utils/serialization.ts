import superjson from 'superjson';
import { z } from 'zod';
import { StepData } from '../types';

export const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

const stepDataSchema = z.record(z.string(), z.unknown());

export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_SIZE): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > maxBytes) {
        throw new SerializationError(
            `Payload size exceeds maximum limit of ${(maxBytes / 1024 / 1024).toFixed(2)}MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
        );
    }
    return stringified;
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/** Decodes a serialized step payload; an empty payload is an empty object. */
export function deserializeStepData(value: string | null | undefined): StepData {
    const decoded = deserialize<unknown>(value);
    if (decoded === undefined) return {};

    const parsed = stepDataSchema.safeParse(decoded);
    if (!parsed.success) {
        throw new SerializationError('Step payload must be an object keyed by output name');
    }
    return parsed.data;
}
