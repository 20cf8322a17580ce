/**
 * Shared utilities for source adapters.
 */
import { readFile } from 'node:fs/promises';
import { SourceFormatError, SourceUnavailableError } from './errors.js';

/**
 * Read a local dictionary file. Missing or unreadable files become
 * SourceUnavailableError.
 */
export async function readSourceFile(path: string, source: string): Promise<string> {
    try {
        return await readFile(path, 'utf-8');
    } catch (error) {
        throw new SourceUnavailableError(
            `Cannot read ${source} file "${path}": ${error instanceof Error ? error.message : String(error)}`,
            source,
            { cause: error }
        );
    }
}

/**
 * Read and parse a JSON dictionary file.
 */
export async function readJsonFile(path: string, source: string): Promise<unknown> {
    const text = await readSourceFile(path, source);
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new SourceFormatError(
            `Invalid JSON in ${source} file "${path}": ${error instanceof Error ? error.message : String(error)}`,
            source
        );
    }
}

/**
 * Split a multi-valued cell ("HER2|NEU, ERBB2") into trimmed, non-empty parts.
 */
export function splitList(value: string | null | undefined, separator: RegExp = /[|,]/): string[] {
    if (!value) return [];
    return value
        .split(separator)
        .map((part) => part.trim().replace(/^"|"$/g, ''))
        .filter((part) => part.length > 0);
}

/**
 * Trim a string; blank becomes null.
 */
export function cleanString(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    return value.trim() || null;
}

/**
 * Stable, upper-cased identifier slug ("Sialyl-Tn" → "SIALYL-TN").
 */
export function idSlug(value: string): string {
    return value
        .trim()
        .toUpperCase()
        .replace(/\s+/g, '_');
}
