// src/infrastructure/persistence/record-parser.ts
import { RecordParseException } from '../../shared/exceptions/validation.exception';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const FIELD_SEPARATOR = ';';

/**
 * Position of a record inside a file, used in parse errors.
 */
export interface RecordLocation {
    file: string;
    record: number;
}

/**
 * Splits file content on `terminator` and drops the last segment,
 * which is empty when the content ends with the terminator.
 */
export function splitRecords(content: string, terminator: string): string[] {
    const records = content.split(terminator);
    return records.slice(0, records.length - 1);
}

export function splitFields(record: string): string[] {
    return record.split(FIELD_SEPARATOR);
}

export function joinFields(fields: Array<string | number>): string {
    return fields.join(FIELD_SEPARATOR);
}

export function fieldAt(fields: string[], index: number, name: string, location: RecordLocation): string {
    const value = fields[index];
    if (value === undefined) {
        throw new RecordParseException(location.file, location.record, {
            field: name,
            message: `missing field at position ${index + 1}`
        });
    }
    return value;
}

export function parseInteger(value: string, name: string, location: RecordLocation): number {
    const parsed = INTEGER_PATTERN.test(value) ? Number(value) : NaN;

    if (!Number.isSafeInteger(parsed)) {
        throw new RecordParseException(location.file, location.record, {
            field: name,
            message: 'not an integer',
            value
        });
    }

    return parsed;
}
