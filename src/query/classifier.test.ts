import { describe, expect, it } from "vitest";
import { KeywordKindClassifier, NoFilterClassifier, createClassifier, extractNameTokens, tokenize } from "./classifier";

describe("KeywordKindClassifier", () => {
    const classifier = new KeywordKindClassifier();

    it("routes institute-wide questions to general documents", () => {
        expect(classifier.classify("What programs exist?")).toBe("general");
        expect(classifier.classify("Tell me about the travel awards")).toBe("general");
    });

    it("leaves person questions unfiltered", () => {
        expect(classifier.classify("Who runs the fellowship program?")).toBeUndefined();
        expect(classifier.classify("Which faculty work on nitrate?")).toBeUndefined();
    });

    it("leaves questions without routing vocabulary unfiltered", () => {
        expect(classifier.classify("water quality in springs")).toBeUndefined();
    });
});

describe("createClassifier", () => {
    it("disables routing in none mode", () => {
        const classifier = createClassifier("none");
        expect(classifier).toBeInstanceOf(NoFilterClassifier);
        expect(classifier.classify("What programs exist?")).toBeUndefined();
    });
});

describe("tokenize", () => {
    it("lowercases and strips surrounding punctuation", () => {
        expect(tokenize("Dr. O'Neil, (hydrology)?")).toEqual(["dr", "o'neil", "hydrology"]);
    });
});

describe("extractNameTokens", () => {
    it("keeps candidate name words only", () => {
        expect(extractNameTokens("Tell me about Jane's work with Cohen, please")).toEqual(["jane", "cohen"]);
        expect(extractNameTokens("What does Jane do? jane!")).toEqual(["jane"]);
    });
});
