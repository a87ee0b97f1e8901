import { describe, expect, it } from "vitest";
import { isFollowUp, resolveRetrievalQuery } from "./followUp";

describe("isFollowUp", () => {
    it("recognises bare follow-ups regardless of case and trailing punctuation", () => {
        expect(isFollowUp("Yes")).toBe(true);
        expect(isFollowUp("  tell me more!! ")).toBe(true);
        expect(isFollowUp("Show me more.")).toBe(true);
    });

    it("treats real questions as new queries", () => {
        expect(isFollowUp("yes, who studies nitrate?")).toBe(false);
        expect(isFollowUp("more about wetlands")).toBe(false);
    });
});

describe("resolveRetrievalQuery", () => {
    it("uses the message itself when it is not a follow-up", () => {
        expect(resolveRetrievalQuery("who studies wetlands", [{ role: "user", content: "earlier" }])).toBe(
            "who studies wetlands"
        );
    });

    it("uses the latest substantive user turn for a follow-up", () => {
        const history = [
            { role: "user" as const, content: "who studies nitrate" },
            { role: "assistant" as const, content: "Jane Doe does." },
            { role: "user" as const, content: "top experts in karst hydrology" },
            { role: "assistant" as const, content: "Here are three. Would you like to see more?" },
            { role: "user" as const, content: "yes" },
            { role: "assistant" as const, content: "Sure." },
        ];

        expect(resolveRetrievalQuery("show more", history)).toBe("top experts in karst hydrology");
    });

    it("keeps the follow-up when there is nothing to fall back to", () => {
        expect(resolveRetrievalQuery("yes", [])).toBe("yes");
        expect(resolveRetrievalQuery("yes", [{ role: "assistant", content: "Anything else?" }])).toBe("yes");
    });
});
