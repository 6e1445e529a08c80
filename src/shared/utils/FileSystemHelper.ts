/**
 * File System Helper
 *
 * Output files of the runner. Failures are logged and reported as `false`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';

export class FileSystemHelper {
    static ensureDir(dirPath: string): boolean {
        if (fs.existsSync(dirPath)) return true;

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.mkdirSync(dirPath, { recursive: true });
                return true;
            },
            { component: 'FileSystemHelper', operation: 'ensureDir', data: { dirPath } },
            false,
            ErrorSeverity.WARNING
        );
    }

    static ensureDirForFile(filePath: string): boolean {
        return this.ensureDir(path.dirname(filePath));
    }

    static safeWriteJSON(filePath: string, data: unknown, pretty: boolean = true): boolean {
        this.ensureDirForFile(filePath);

        return ErrorHandler.safeExecuteSync(
            () => {
                const content = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
                fs.writeFileSync(filePath, content);
                return true;
            },
            { component: 'FileSystemHelper', operation: 'safeWriteJSON', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    /**
     * Append one line (newline added) to a text file, creating it if needed
     */
    static appendLine(filePath: string, line: string): boolean {
        this.ensureDirForFile(filePath);

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.appendFileSync(filePath, `${line}\n`);
                return true;
            },
            { component: 'FileSystemHelper', operation: 'appendLine', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    static safeReadText(filePath: string, defaultValue: string = ''): string {
        if (!fs.existsSync(filePath)) return defaultValue;

        return ErrorHandler.safeExecuteSync(
            () => fs.readFileSync(filePath, 'utf-8'),
            { component: 'FileSystemHelper', operation: 'safeReadText', data: { filePath } },
            defaultValue,
            ErrorSeverity.WARNING
        );
    }

    /**
     * File-name-safe form of a URL host
     */
    static hostSlug(url: string): string {
        let host: string;
        try {
            host = new URL(url).hostname;
        } catch {
            host = url;
        }
        return host.replace(/^www\./, '').replace(/[^a-z0-9.-]/gi, '_') || 'unknown';
    }
}

