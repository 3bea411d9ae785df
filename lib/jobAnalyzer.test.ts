import { describe, expect, it } from "vitest";
import { InvalidInputError } from "./errors";
import {
    analyzeJobDescription,
    countOccurrences,
    extractExperienceLevel,
    extractKeywords,
    extractRequirements,
    extractResponsibilities,
    extractSkills,
    preprocess,
} from "./jobAnalyzer";
import { STOP_WORDS } from "./skillCatalog";

const FULL_OVERLAP_JD = "Required: Python, Docker, and strong leadership skills, Python, Python";

const BACKEND_JD = `About the role
We build payment systems.

Requirements:
- 3+ years building REST APIs
- Solid knowledge of PostgreSQL
- Git

Responsibilities:
• Design and ship backend services
• Review code from peers`;

describe("preprocess", () => {
    it("lowercases, flattens whitespace and keeps c++, c#, node.js intact", () => {
        expect(preprocess("Senior C++ / C# dev, Node.js!\n\nGreat   team")).toBe(
            "senior c++   c# dev  node.js  great team"
        );
    });
});

describe("countOccurrences", () => {
    it("counts non-overlapping hits", () => {
        expect(countOccurrences("aaaa", "aa")).toBe(2);
        expect(countOccurrences("python, python", "python")).toBe(2);
        expect(countOccurrences("anything", "")).toBe(0);
    });
});

describe("extractSkills", () => {
    it("groups technical hits by category and collects soft skills", () => {
        expect(extractSkills("We need Python and Docker experience. Strong communication.")).toEqual({
            technical: ["python", "docker"],
            soft: ["communication"],
            allCategories: { programming: ["python"], cloud: ["docker"] },
        });
    });

    it("matches catalog terms as substrings", () => {
        expect(extractSkills("Looking for a JavaScript expert").allCategories).toEqual({
            programming: ["java", "javascript"],
        });
    });
});

describe("sections", () => {
    it("splits the requirements block on bullets and drops short fragments", () => {
        expect(extractRequirements(BACKEND_JD)).toEqual([
            "3+ years building REST APIs",
            "Solid knowledge of PostgreSQL",
        ]);
    });

    it("reads responsibilities up to the end of the text", () => {
        expect(extractResponsibilities(BACKEND_JD)).toEqual([
            "Design and ship backend services",
            "Review code from peers",
        ]);
    });

    it("keeps the same line when two headers capture it", () => {
        expect(extractRequirements("Requirements and qualifications:\n- Five years of backend work")).toEqual([
            "and qualifications:",
            "Five years of backend work",
            "Five years of backend work",
        ]);
    });

    it("treats 'Required:' as a requirements header", () => {
        expect(extractRequirements(FULL_OVERLAP_JD)).toEqual([
            "Python, Docker, and strong leadership skills, Python, Python",
        ]);
    });

    it("does not let an earlier 'X required:' line hide the requirements section", () => {
        const analysis = analyzeJobDescription(
            "Travel required: rarely\n\nRequirements:\n- Deep experience with Kubernetes clusters\n- Strong communication with stakeholders"
        );

        expect(analysis.requirements).toEqual([
            "Deep experience with Kubernetes clusters",
            "Strong communication with stakeholders",
        ]);
        expect(analysis.prioritySkills).toEqual([
            { skill: "kubernetes", frequency: 1, inRequirements: true },
            { skill: "communication", frequency: 1, inRequirements: true },
        ]);
    });

    it("returns nothing when no header is present", () => {
        expect(extractRequirements("Cook wanted for a busy kitchen")).toEqual([]);
        expect(extractResponsibilities("Cook wanted for a busy kitchen")).toEqual([]);
    });
});

describe("extractExperienceLevel", () => {
    it("lets an entry indicator win over a years mention", () => {
        expect(extractExperienceLevel("Junior developer, 5+ years welcome")).toBe("entry");
    });

    it("finds level words", () => {
        expect(extractExperienceLevel("Senior engineer")).toBe("senior");
    });

    it("falls back to years of experience", () => {
        expect(extractExperienceLevel("We want 4 years of experience with APIs")).toBe("mid");
        expect(extractExperienceLevel("10 years of experience building data pipelines")).toBe("senior");
        expect(extractExperienceLevel("1 year experience in retail")).toBe("entry");
    });

    it("returns unknown when nothing matches", () => {
        expect(extractExperienceLevel("Cook wanted")).toBe("unknown");
    });
});

describe("extractKeywords", () => {
    it("counts case-insensitively and drops stop-words and short tokens", () => {
        expect(extractKeywords("Python python PYTHON developer. The developer ships APIs in Go; go team!")).toEqual([
            ["python", 3],
            ["developer", 2],
            ["ships", 1],
            ["apis", 1],
            ["team", 1],
        ]);
    });

    it("keeps first-seen order for equal counts and honours the limit", () => {
        expect(extractKeywords("zeta alpha zeta alpha beta")).toEqual([
            ["zeta", 2],
            ["alpha", 2],
            ["beta", 1],
        ]);
        expect(extractKeywords("zeta alpha zeta alpha beta", 1)).toEqual([["zeta", 2]]);
    });

    it("never returns a stop-word whatever the casing", () => {
        const keywords = extractKeywords("THE And WITH ourselves Kubernetes");
        expect(keywords).toEqual([["kubernetes", 1]]);
        for (const [word] of extractKeywords(BACKEND_JD.toUpperCase())) {
            expect(STOP_WORDS.has(word)).toBe(false);
            expect(word.length).toBeGreaterThan(2);
        }
    });
});

describe("analyzeJobDescription", () => {
    it("builds the full analysis for a short posting", () => {
        expect(analyzeJobDescription(FULL_OVERLAP_JD)).toEqual({
            skills: {
                technical: ["python", "docker"],
                soft: ["leadership"],
                allCategories: { programming: ["python"], cloud: ["docker"] },
            },
            requirements: ["Python, Docker, and strong leadership skills, Python, Python"],
            responsibilities: [],
            experienceLevel: "senior",
            keywords: [
                ["python", 3],
                ["required", 1],
                ["docker", 1],
                ["strong", 1],
                ["leadership", 1],
                ["skills", 1],
            ],
            prioritySkills: [
                { skill: "python", frequency: 3, inRequirements: true },
                { skill: "docker", frequency: 1, inRequirements: true },
                { skill: "leadership", frequency: 1, inRequirements: true },
            ],
        });
    });

    it("flags repeated skills outside the requirements block", () => {
        const analysis = analyzeJobDescription("Docker everywhere. We love Docker.\n\nRequirements: python scripting");
        expect(analysis.prioritySkills).toEqual([
            { skill: "python", frequency: 1, inRequirements: true },
            { skill: "docker", frequency: 2, inRequirements: false },
        ]);
    });

    it("is idempotent", () => {
        expect(analyzeJobDescription(BACKEND_JD)).toEqual(analyzeJobDescription(BACKEND_JD));
    });

    it("passes the keyword limit through", () => {
        expect(analyzeJobDescription(BACKEND_JD, { keywordLimit: 2 }).keywords).toHaveLength(2);
    });

    it("rejects blank text", () => {
        expect(() => analyzeJobDescription("")).toThrow(InvalidInputError);
        expect(() => analyzeJobDescription("   ")).toThrow(InvalidInputError);
        expect(() => analyzeJobDescription(" \n\t ")).toThrow(InvalidInputError);
    });
});
