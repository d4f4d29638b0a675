// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { InvalidArgumentError } from "commander";
import { describe, it, expect } from "vitest";

import { parsePositiveInt, parseUnit, readContent, toRequestInput } from "../../src/input.js";

describe("parseUnit", () => {
    it("accepts numbers in [0, 1]", () => {
        expect(parseUnit("0")).toBe(0);
        expect(parseUnit("0.75")).toBe(0.75);
        expect(parseUnit("1")).toBe(1);
    });

    it("rejects anything else", () => {
        expect(() => parseUnit("1.5")).toThrow(InvalidArgumentError);
        expect(() => parseUnit("-0.1")).toThrow(InvalidArgumentError);
        expect(() => parseUnit("cheap")).toThrow("Expected a number between 0 and 1.");
    });
});

describe("parsePositiveInt", () => {
    it("accepts whole numbers from 1", () => {
        expect(parsePositiveInt("1")).toBe(1);
        expect(parsePositiveInt("30")).toBe(30);
    });

    it("rejects zero, fractions and text", () => {
        expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
        expect(() => parsePositiveInt("2.5")).toThrow("Expected a positive whole number.");
        expect(() => parsePositiveInt("week")).toThrow(InvalidArgumentError);
    });
});

describe("readContent", () => {
    it("prefers the file over the argument", () => {
        const dir = mkdtempSync(join(tmpdir(), "tollgate-cli-"));
        try {
            const path = join(dir, "snippet.py");
            writeFileSync(path, "def hello(): print('hi')\n");
            expect(readContent("ignored", path)).toBe("def hello(): print('hi')\n");
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });

    it("falls back to the argument, including an empty one", () => {
        expect(readContent("x = 1", undefined)).toBe("x = 1");
        expect(readContent("", undefined)).toBe("");
    });

    it("requires one of them", () => {
        expect(() => readContent(undefined, undefined)).toThrow(
            "Provide the content as an argument or with --file <path>",
        );
    });
});

describe("toRequestInput", () => {
    it("maps flags onto the request", () => {
        expect(
            toRequestInput("x", { taskType: "bug_detection", id: "req-1", costPriority: 0.9, json: true }),
        ).toEqual({ id: "req-1", content: "x", taskType: "bug_detection", preferences: { costPriority: 0.9 } });
    });

    it("leaves unset preferences out", () => {
        expect(toRequestInput("x", { taskType: "t" })).toEqual({ content: "x", taskType: "t", preferences: {} });
    });
});
