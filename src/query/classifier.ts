import type { RoutingMode } from "../config/types";
import type { DocumentKind } from "../database/types";
import stopWords from "./stopWords.json";

/**
 * Decides which document kind a question is about. `undefined` means no
 * filter; callers must treat the answer as a relevance hint only.
 */
export interface QueryKindClassifier {
    classify(query: string): DocumentKind | undefined;
}

const INSTITUTE_TERMS = new Set([
    "program",
    "programs",
    "mission",
    "history",
    "facility",
    "facilities",
    "fellowship",
    "fellowships",
    "award",
    "awards",
    "scholarship",
    "scholarships",
    "event",
    "events",
    "seminar",
    "seminars",
    "partnership",
    "partnerships",
    "apply",
    "application",
    "admission",
    "admissions",
    "funding",
    "news",
    "symposium",
]);

const PERSON_TERMS = new Set([
    "who",
    "whom",
    "whose",
    "dr",
    "prof",
    "professor",
    "professors",
    "faculty",
    "researcher",
    "researchers",
    "scientist",
    "scientists",
    "expert",
    "experts",
    "person",
    "people",
    "member",
    "members",
    "he",
    "she",
    "they",
    "his",
    "her",
]);

const STOP_WORDS: ReadonlySet<string> = new Set(stopWords);

export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/\s+/)
        .map((word) => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
        .filter(Boolean);
}

export class KeywordKindClassifier implements QueryKindClassifier {
    classify(query: string): DocumentKind | undefined {
        const words = tokenize(query);
        if (words.some((word) => PERSON_TERMS.has(word))) {
            return undefined;
        }
        return words.some((word) => INSTITUTE_TERMS.has(word)) ? "general" : undefined;
    }
}

export class NoFilterClassifier implements QueryKindClassifier {
    classify(): DocumentKind | undefined {
        return undefined;
    }
}

export function createClassifier(mode: RoutingMode): QueryKindClassifier {
    return mode === "keyword" ? new KeywordKindClassifier() : new NoFilterClassifier();
}

/**
 * Words that could be part of a person's name: longer than two characters,
 * not on the stop list, possessives dropped, first occurrence only.
 */
export function extractNameTokens(message: string): string[] {
    const tokens = tokenize(message)
        .map((word) => word.replace(/['’]s$/, ""))
        .filter((word) => word.length > 2 && !STOP_WORDS.has(word));
    return [...new Set(tokens)];
}
