// src/infrastructure/persistence/file-io.ts
import { open, stat, FileHandle } from 'fs/promises';
import { FileNotFoundException } from '../../shared/exceptions/infrastructure.exception';
import { logger } from '../monitoring/logger.service';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

async function closeQuietly(handle: FileHandle, path: string): Promise<void> {
    try {
        await handle.close();
    } catch (error) {
        logger.warn('Failed to close ledger file', {
            path,
            error: error instanceof Error ? error.message : String(error)
        });
    }
}

/**
 * Reads a whole file as UTF-8. Open and read failures surface as FileNotFoundException.
 */
export async function readFileContent(path: string): Promise<string> {
    let handle: FileHandle;
    try {
        handle = await open(path, 'r');
    } catch (error) {
        logger.error('Failed to open ledger file for reading', error instanceof Error ? error : undefined, { path });
        throw new FileNotFoundException(path, error);
    }

    try {
        return await handle.readFile({ encoding: 'utf8' });
    } catch (error) {
        logger.error('Failed to read ledger file', error instanceof Error ? error : undefined, { path });
        throw new FileNotFoundException(path, error);
    } finally {
        await closeQuietly(handle, path);
    }
}

/**
 * Creates or truncates `path` and writes `content` to it.
 */
export async function writeFileContent(path: string, content: string): Promise<void> {
    let handle: FileHandle;
    try {
        handle = await open(path, 'w', 0o666);
    } catch (error) {
        logger.error('Failed to open ledger file for writing', error instanceof Error ? error : undefined, { path });
        throw new FileNotFoundException(path, error);
    }

    try {
        await handle.writeFile(content, { encoding: 'utf8' });
    } catch (error) {
        logger.error('Failed to write ledger file', error instanceof Error ? error : undefined, { path });
        throw new FileNotFoundException(path, error);
    } finally {
        await closeQuietly(handle, path);
    }
}

/**
 * False only when nothing exists at `path`; any other stat failure is raised.
 */
export async function fileExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return false;
        }
        throw new FileNotFoundException(path, error);
    }
}
