import { describe, it } from "mocha";
import { expect } from "chai";

import { createFieldReferenceExtractor } from "../src/graph/references.js";
import { FieldAccessor } from "../src/query/fieldAccessor.js";
import { InMemoryRecordSource } from "../src/records/memorySource.js";
import {
  defineRecordType,
  intValue,
  listValue,
  objectValue,
  referenceValue,
} from "../src/records/values.js";
import { ItemData, makeRecord } from "./helpers/catalogFixtures.js";

const Slot = defineRecordType("Slot", [
  { name: "item", kind: "reference" },
  { name: "count", kind: "int" },
]);

const Bundle = defineRecordType("Bundle", [
  { name: "featured", kind: "reference" },
  { name: "slot", kind: "object", schema: Slot },
  { name: "extras", kind: "list", itemKind: "reference" },
  { name: "__owner", kind: "reference" },
]);

describe("field reference extractor", () => {
  it("follows references in fields, nested objects and lists", () => {
    const sword = makeRecord(ItemData, "items/sword.asset");
    const shield = makeRecord(ItemData, "items/shield.asset");
    const potion = makeRecord(ItemData, "items/potion.asset");
    const bundle = makeRecord(Bundle, "bundles/starter.asset", {
      featured: referenceValue("items/sword.asset"),
      slot: objectValue({ item: referenceValue("items/shield.asset"), count: intValue(2) }),
      extras: listValue([referenceValue("items/potion.asset"), null, referenceValue("items/sword.asset")]),
    });
    const source = new InMemoryRecordSource([sword, shield, potion, bundle]);

    const references = Array.from(createFieldReferenceExtractor(source).referencesOf(bundle));

    expect(references).to.deep.equal([sword, shield, potion]);
  });

  it("skips targets the source cannot load and reserved fields", () => {
    const source = new InMemoryRecordSource();
    const bundle = makeRecord(Bundle, "bundles/broken.asset", {
      featured: referenceValue("items/missing.asset"),
      __owner: referenceValue("bundles/broken.asset"),
    });
    source.upsert(bundle);

    expect(Array.from(createFieldReferenceExtractor(source).referencesOf(bundle))).to.deep.equal([]);
  });

  it("reads fields through the given accessor", () => {
    const sword = makeRecord(ItemData, "items/sword.asset");
    const bundle = makeRecord(Bundle, "bundles/hidden.asset", { featured: referenceValue("items/sword.asset") });
    const source = new InMemoryRecordSource([sword, bundle]);
    const accessor = new FieldAccessor({ reservedFields: ["featured"] });

    expect(Array.from(createFieldReferenceExtractor(source, accessor).referencesOf(bundle))).to.deep.equal([]);
  });
});

describe("in-memory record source", () => {
  it("lists records in insertion order and replaces by id in place", () => {
    const first = makeRecord(ItemData, "a", {}, "first");
    const second = makeRecord(ItemData, "b");
    const source = new InMemoryRecordSource([first, second]);
    const replacement = makeRecord(ItemData, "a", {}, "replacement");

    source.upsert(replacement);

    expect(source.size).to.equal(2);
    expect(source.listAllRecords()).to.deep.equal([replacement, second]);
    expect(source.loadByIdentity("a")).to.equal(replacement);
    expect(source.loadByIdentity("zzz")).to.equal(null);
  });

  it("notifies subscribers of effective changes only", () => {
    const source = new InMemoryRecordSource([makeRecord(ItemData, "a")]);
    let notifications = 0;
    const unsubscribe = source.subscribe(() => {
      notifications += 1;
    });

    source.upsert(makeRecord(ItemData, "b"));
    expect(source.remove("b")).to.equal(true);
    expect(source.remove("b")).to.equal(false);
    unsubscribe();
    source.upsert(makeRecord(ItemData, "c"));

    expect(notifications).to.equal(2);
  });

  it("does not notify when the stored record is written again", () => {
    const stored = makeRecord(ItemData, "a");
    const source = new InMemoryRecordSource([stored]);
    let notifications = 0;
    source.subscribe(() => {
      notifications += 1;
    });

    source.upsert(stored);
    expect(notifications).to.equal(0);
    source.upsert(makeRecord(ItemData, "a", { price: intValue(3) }));
    expect(notifications).to.equal(1);
  });

  it("refuses records without an id", () => {
    expect(() => new InMemoryRecordSource([makeRecord(ItemData, "")])).to.throw("non-empty id");
  });
});
