import { describe, it, expect } from "vitest";
import { createRuleSet, findRule, resolveCategory } from "../../../src/triage/rules.js";
import { DEFAULT_SYSTEM_PROMPT } from "../../../src/triage/prompts.js";
import { ConfigError } from "../../../src/core/errors.js";
import { createTestRuleSet } from "../../helpers/fixtures.js";

describe("createRuleSet", () => {
  it("appends the reserved unclassified category", () => {
    const ruleSet = createTestRuleSet();
    const names = ruleSet.categories.map((c) => c.name);
    expect(names).toEqual(["newsletters", "receipts", "urgent", "spam", "unclassified"]);
    expect(findRule(ruleSet, "unclassified")?.action).toBe("none");
  });

  it("keeps a user-described unclassified category in place", () => {
    const ruleSet = createRuleSet({
      categories: [
        { name: "Unclassified", description: "Leave for me", action: "none" },
        { name: "urgent", description: "", action: "star" },
      ],
    });
    expect(ruleSet.categories.map((c) => c.name)).toEqual(["unclassified", "urgent"]);
    expect(ruleSet.categories[0]?.description).toBe("Leave for me");
  });

  it("treats flag as star", () => {
    const ruleSet = createRuleSet({
      categories: [{ name: "vip", description: "", action: "flag" }],
    });
    expect(findRule(ruleSet, "vip")?.action).toBe("star");
  });

  it("carries target folders and age gates", () => {
    const ruleSet = createRuleSet({
      categories: [
        {
          name: "promotions",
          description: "Offers",
          action: "move",
          target_folder: "Promotions",
          older_than_minutes: 60,
        },
      ],
    });
    expect(findRule(ruleSet, "promotions")).toEqual({
      name: "promotions",
      description: "Offers",
      action: "move",
      targetFolder: "Promotions",
      olderThanMinutes: 60,
    });
  });

  it("uses the default prompts unless overridden", () => {
    expect(createTestRuleSet().systemPrompt).toBe(DEFAULT_SYSTEM_PROMPT);
    const custom = createRuleSet({ categories: [], systemPrompt: "  Be brief.  " });
    expect(custom.systemPrompt).toBe("Be brief.");
  });

  it("collects every invalid definition into one ConfigError", () => {
    let caught: unknown;
    try {
      createRuleSet({
        categories: [
          { name: "news", description: "", action: "move" },
          { name: "News", description: "", action: "none" },
          { name: "urgent", description: "", action: "star", target_folder: "Urgent" },
          { name: "unclassified", description: "", action: "trash" },
        ],
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toEqual([
      'categories[0] "news": action "move" requires target_folder',
      'categories[1] "News": duplicate category name',
      'categories[2] "urgent": target_folder is only valid with action "move"',
      'categories[3] "unclassified": the reserved category must have action "none"',
    ]);
  });

  it("is deeply frozen", () => {
    const ruleSet = createTestRuleSet();
    expect(Object.isFrozen(ruleSet)).toBe(true);
    expect(Object.isFrozen(ruleSet.categories)).toBe(true);
    expect(Object.isFrozen(ruleSet.categories[0])).toBe(true);
  });
});

describe("resolveCategory", () => {
  const ruleSet = createTestRuleSet();

  it("matches exactly first, then case-insensitively", () => {
    expect(resolveCategory(ruleSet, "receipts")).toBe("receipts");
    expect(resolveCategory(ruleSet, " Receipts ")).toBe("receipts");
  });

  it("returns null for unknown names", () => {
    expect(resolveCategory(ruleSet, "invoices")).toBeNull();
  });
});
