import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { DocumentKind } from "../database/types";
import { ChunkingError, errorMessage } from "../errors";

export interface SourceDocument {
    id: string;
    kind: DocumentKind;
    displayName: string;
    rawText: string;
    relativePath: string;
}

export interface SourceLoadOptions {
    dataDir: string;
    generalInfoDir: string;
    instituteName: string;
}

export interface SourceLoadResult {
    documents: SourceDocument[];
    failures: ChunkingError[];
}

const TEXT_EXTENSION = ".txt";

function toPosix(relativePath: string): string {
    return relativePath.split(path.sep).join("/");
}

function titleCase(value: string): string {
    return value
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(" ");
}

export function classifyKind(relativePath: string, generalInfoDir: string): DocumentKind {
    const [topLevel] = toPosix(relativePath).split("/");
    return topLevel === generalInfoDir ? "general" : "faculty";
}

/**
 * Path below the kind's own root: general documents drop the general-info
 * directory, faculty documents keep their full relative path.
 */
export function kindRelativePath(kind: DocumentKind, relativePath: string, generalInfoDir: string): string {
    const posix = toPosix(relativePath);
    const prefix = `${generalInfoDir}/`;
    return kind === "general" && posix.startsWith(prefix) ? posix.slice(prefix.length) : posix;
}

export function sourceIdFor(kind: DocumentKind, kindRelative: string): string {
    const withoutExtension = toPosix(kindRelative).replace(/\.[^./]+$/, "");
    return `${kind}_${withoutExtension.replace(/\//g, "_")}`;
}

/**
 * `Jane_Doe.txt` becomes `Jane Doe`; `general_info/graduate_programs.txt`
 * becomes `<institute> - Graduate Programs`.
 */
export function displayNameFor(kind: DocumentKind, relativePath: string, instituteName: string): string {
    const stem = path.basename(relativePath, path.extname(relativePath)).replace(/_/g, " ").trim();
    if (kind === "general") {
        return `${instituteName} - ${titleCase(stem)}`;
    }
    return stem;
}

async function listTextFiles(root: string, current = root): Promise<string[]> {
    const entries = await readdir(current, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
        const absolute = path.join(current, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await listTextFiles(root, absolute)));
        } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === TEXT_EXTENSION) {
            files.push(path.relative(root, absolute));
        }
    }

    return files;
}

export async function loadSourceDocuments(options: SourceLoadOptions, logger?: Logger): Promise<SourceLoadResult> {
    let relativePaths: string[];
    try {
        relativePaths = await listTextFiles(options.dataDir);
    } catch (error) {
        throw new ChunkingError(`Cannot read data directory ${options.dataDir}: ${errorMessage(error)}`, undefined, {
            cause: error,
        });
    }

    relativePaths.sort((a, b) => {
        const left = toPosix(a);
        const right = toPosix(b);
        return left < right ? -1 : left > right ? 1 : 0;
    });

    const documents: SourceDocument[] = [];
    const failures: ChunkingError[] = [];

    for (const relativePath of relativePaths) {
        const kind = classifyKind(relativePath, options.generalInfoDir);
        const id = sourceIdFor(kind, kindRelativePath(kind, relativePath, options.generalInfoDir));

        try {
            const rawText = await readFile(path.join(options.dataDir, relativePath), "utf8");
            documents.push({
                id,
                kind,
                displayName: displayNameFor(kind, relativePath, options.instituteName),
                rawText,
                relativePath: toPosix(relativePath),
            });
        } catch (error) {
            logger?.warn({ err: error, file: relativePath }, "Skipping unreadable source file");
            failures.push(new ChunkingError(`Cannot read ${relativePath}: ${errorMessage(error)}`, id, { cause: error }));
        }
    }

    return { documents, failures };
}
