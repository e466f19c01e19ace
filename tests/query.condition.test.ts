import { describe, it } from "mocha";
import { expect } from "chai";

import { QueryCondition, QueryGroup } from "../src/query/condition.js";
import { FieldAccessor } from "../src/query/fieldAccessor.js";
import {
  boolValue,
  enumValue,
  intValue,
  referenceValue,
  stringValue,
} from "../src/records/values.js";
import { MonsterDefinition, makeRecord } from "./helpers/catalogFixtures.js";

const goblin = makeRecord(MonsterDefinition, "monsters/goblin.asset", {
  hp: intValue(30),
  label: stringValue("Goblin"),
  code: stringValue("G-10"),
  rarity: enumValue("Common", 0),
  boss: boolValue(false),
});

const dragon = makeRecord(MonsterDefinition, "monsters/dragon.asset", {
  hp: intValue(500),
  label: stringValue("Dragon"),
  code: stringValue("D-9"),
  rarity: enumValue("Epic", 2),
  boss: boolValue(true),
  loot: referenceValue("items/hoard.asset"),
});

describe("query conditions", () => {
  it("compares numeric fields", () => {
    const condition = new QueryCondition({ field: "hp", operator: "gt", value: 50 });

    expect(condition.evaluate(goblin)).to.equal(false);
    expect(condition.evaluate(dragon)).to.equal(true);
    expect(new QueryCondition({ field: "hp", operator: "lte", value: 30 }).evaluate(goblin)).to.equal(true);
  });

  it("defaults to an enabled equality test against null", () => {
    const condition = new QueryCondition({ field: "loot" });

    expect(condition.operator).to.equal("eq");
    expect(condition.enabled).to.equal(true);
    expect(condition.evaluate(goblin)).to.equal(true);
    expect(condition.evaluate(dragon)).to.equal(false);
  });

  it("is false when disabled, for unknown fields and for missing records", () => {
    expect(new QueryCondition({ field: "hp", operator: "gt", value: 0, enabled: false }).evaluate(dragon)).to.equal(false);
    expect(new QueryCondition({ field: "mana", operator: "isNull" }).evaluate(dragon)).to.equal(false);
    expect(new QueryCondition({ field: "hp", operator: "isNotNull" }).evaluate(null)).to.equal(false);
  });

  it("tests presence with isNull and isNotNull", () => {
    expect(new QueryCondition({ field: "loot", operator: "isNull" }).evaluate(goblin)).to.equal(true);
    expect(new QueryCondition({ field: "loot", operator: "isNotNull" }).evaluate(dragon)).to.equal(true);
  });

  it("applies the text operators case-insensitively", () => {
    expect(new QueryCondition({ field: "label", operator: "contains", value: "RAG" }).evaluate(dragon)).to.equal(true);
    expect(new QueryCondition({ field: "label", operator: "startsWith", value: "gob" }).evaluate(goblin)).to.equal(true);
    expect(new QueryCondition({ field: "label", operator: "endsWith", value: "ON" }).evaluate(dragon)).to.equal(true);
  });

  it("requires both sides to exist for notContains", () => {
    const condition = new QueryCondition({ field: "label", operator: "notContains", value: "rag" });

    expect(condition.evaluate(goblin)).to.equal(true);
    expect(condition.evaluate(dragon)).to.equal(false);
    expect(new QueryCondition({ field: "loot", operator: "notContains", value: "x" }).evaluate(goblin)).to.equal(false);
    expect(new QueryCondition({ field: "label", operator: "notContains", value: null }).evaluate(goblin)).to.equal(false);
  });

  it("matches regular expressions only on string fields", () => {
    expect(new QueryCondition({ field: "label", operator: "regex", value: "^Dr" }).evaluate(dragon)).to.equal(true);
    expect(new QueryCondition({ field: "code", operator: "regex", value: "^[A-Z]-\\d+$" }).evaluate(goblin)).to.equal(true);
    expect(new QueryCondition({ field: "hp", operator: "regex", value: "\\d+" }).evaluate(dragon)).to.equal(false);
    expect(new QueryCondition({ field: "label", operator: "regex", value: 5 }).evaluate(dragon)).to.equal(false);
  });

  it("treats a malformed pattern as a non-match", () => {
    expect(new QueryCondition({ field: "label", operator: "regex", value: "[" }).evaluate(dragon)).to.equal(false);
  });

  it("compares enums by member name or ordinal", () => {
    expect(new QueryCondition({ field: "rarity", operator: "eq", value: "epic" }).evaluate(dragon)).to.equal(true);
    expect(new QueryCondition({ field: "rarity", operator: "gte", value: 1 }).evaluate(goblin)).to.equal(false);
  });

  it("keeps string comparisons lexicographic", () => {
    const condition = new QueryCondition({ field: "code", operator: "lt", value: "G-9" });

    expect(condition.evaluate(goblin)).to.equal(true);
  });

  it("respects a custom accessor", () => {
    const accessor = new FieldAccessor({ reservedFields: ["hp"] });
    const condition = new QueryCondition({ field: "hp", operator: "gt", value: 0, accessor });

    expect(condition.evaluate(dragon)).to.equal(false);
  });

  it("renders readable descriptions", () => {
    expect(new QueryCondition({ field: "hp", operator: "gt", value: 50 }).describe()).to.equal("hp > 50");
    expect(new QueryCondition({ field: "name", operator: "contains", value: "go" }).describe()).to.equal(
      'name contains "go"',
    );
    expect(new QueryCondition({ field: "loot", operator: "isNull" }).describe()).to.equal("loot is null");
    expect(new QueryCondition({ field: "boss", operator: "neq", value: true }).describe()).to.equal("boss != true");
  });
});

describe("query groups", () => {
  it("requires every enabled condition under AND", () => {
    const group = new QueryGroup("and");
    group.addCondition("hp", "gt", 20);
    group.addCondition("boss", "eq", true);

    expect(group.evaluate(goblin)).to.equal(false);
    expect(group.evaluate(dragon)).to.equal(true);
    expect(group.describe()).to.equal("hp > 20 AND boss == true");
  });

  it("requires any enabled condition under OR", () => {
    const group = new QueryGroup("or");
    group.addCondition("label", "eq", "Goblin");
    group.addCondition("hp", "gt", 100);

    expect(group.evaluate(goblin)).to.equal(true);
    expect(group.evaluate(dragon)).to.equal(true);
  });

  it("lets every record through when no condition is enabled", () => {
    const group = new QueryGroup("or");
    expect(group.evaluate(goblin)).to.equal(true);
    expect(group.describe()).to.equal("(all records)");

    const condition = group.addCondition("hp", "gt", 1000);
    condition.enabled = false;
    expect(group.count).to.equal(1);
    expect(group.enabledCount).to.equal(0);
    expect(group.evaluate(goblin)).to.equal(true);
  });

  it("ignores disabled conditions in evaluation and description", () => {
    const group = new QueryGroup("and");
    group.addCondition("hp", "gt", 20);
    const disabled = group.addCondition("label", "eq", "Nobody");
    disabled.enabled = false;

    expect(group.evaluate(dragon)).to.equal(true);
    expect(group.describe()).to.equal("hp > 20");
  });

  it("adds, removes and clears conditions", () => {
    const group = new QueryGroup();
    const first = group.addCondition();

    expect(first.field).to.equal("name");
    expect(first.operator).to.equal("eq");
    expect(group.removeCondition(first)).to.equal(true);
    expect(group.removeCondition(first)).to.equal(false);

    group.addCondition("hp");
    group.addCondition("label");
    group.clear();
    expect(group.count).to.equal(0);
  });
});
