import { describe, it, expect } from "vitest";
import type { GroupRecord } from "../enumeration/types";
import { createSilentLogger } from "../logger";
import { classifyGroups } from "./classifier";

const group = (subscriptionName: string, name: string): GroupRecord => ({
  name,
  subscriptionId: `id-${subscriptionName}`,
  subscriptionName,
  providerId: `/subscriptions/id-${subscriptionName}/resourceGroups/${name}`,
});

const inventory: GroupRecord[] = [
  group("A", "rg-prod"),
  group("A", "rg-test"),
  group("B", "rg-dev"),
  group("B", "RG-Prod-Data"),
  group("C", "network-shared"),
];

const key = (g: GroupRecord) => `${g.subscriptionName}.${g.name}`;

describe("classifyGroups", () => {
  it("keeps excluded groups and deletes the rest", () => {
    const result = classifyGroups(inventory.slice(0, 3), ["rg-prod"], createSilentLogger());
    expect(result.toKeep.map(key)).toEqual(["A.rg-prod"]);
    expect(result.toDelete.map(key)).toEqual(["A.rg-test", "B.rg-dev"]);
  });

  it("records which pattern excluded a group", () => {
    const result = classifyGroups(inventory, ["^network-", "prod"], createSilentLogger());
    expect(result.toKeep.map((g) => [key(g), g.excludedBy])).toEqual([
      ["A.rg-prod", "prod"],
      ["B.RG-Prod-Data", "prod"],
      ["C.network-shared", "^network-"],
    ]);
  });

  it("deletes everything when there are no patterns", () => {
    const result = classifyGroups(inventory, [], createSilentLogger());
    expect(result.toDelete).toHaveLength(inventory.length);
    expect(result.toKeep).toEqual([]);
  });

  it("skips an invalid regex but applies the other patterns", () => {
    const result = classifyGroups(inventory, ["rg-[prod", "rg-dev"], createSilentLogger());
    expect(result.toKeep.map(key)).toEqual(["B.rg-dev"]);
    expect(result.toDelete.map(key)).toEqual(["A.rg-prod", "A.rg-test", "B.RG-Prod-Data", "C.network-shared"]);
  });

  it("partitions the inventory for any pattern set", () => {
    const patternSets = [[], ["rg"], ["^rg-t", "dev"], ["(", "shared"], [".*"], ["nomatch"]];
    for (const patterns of patternSets) {
      const { toDelete, toKeep } = classifyGroups(inventory, patterns, createSilentLogger());
      const deleted = new Set(toDelete.map(key));
      const kept = new Set(toKeep.map(key));

      expect(deleted.size + kept.size).toBe(inventory.length);
      expect([...deleted].filter((k) => kept.has(k))).toEqual([]);
      expect(new Set([...deleted, ...kept])).toEqual(new Set(inventory.map(key)));
    }
  });

  it("gives the same partition regardless of pattern order", () => {
    const forward = classifyGroups(inventory, ["dev", "^rg-p"], createSilentLogger());
    const reverse = classifyGroups(inventory, ["^rg-p", "dev"], createSilentLogger());
    expect(forward.toDelete).toEqual(reverse.toDelete);
    expect(forward.toKeep.map(key)).toEqual(reverse.toKeep.map(key));
  });
});
