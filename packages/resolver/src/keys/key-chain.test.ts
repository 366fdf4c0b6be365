import { describe, it } from "mocha";
import { expect } from "chai";
import { createTestTree, refOf, stmt } from "@yangmodel/frontend";
import { createResolverContext } from "../context.js";
import { listKeyLeaves, resolveKeyChain } from "./key-chain.js";

const leaf = (name: string, type: string, ref?: string) =>
  stmt("leaf", name, [stmt("type", type)], ref ? { ref } : {});

describe("Key chain", () => {
  const tree = createTestTree([
    stmt("module", "net", [
      stmt("list", "interface", [
        stmt("key", "name"),
        leaf("name", "string"),
        leaf("mtu", "uint16"),
        stmt("list", "address", [
          stmt("key", "name ip"),
          leaf("name", "string"),
          leaf("ip", "string"),
          stmt("container", "stats", [], { ref: "stats" }),
        ], { ref: "address" }),
      ], { ref: "interface" }),
      stmt("list", "x", [
        stmt("key", "y"),
        leaf("y", "int8"),
        stmt("list", "x", [
          stmt("key", "y"),
          leaf("y", "int8"),
          stmt("list", "x", [stmt("key", "y"), leaf("y", "int8")], { ref: "x3" }),
        ]),
      ]),
      stmt("container", "box", [
        stmt("list", "entry", [leaf("v", "string")], { ref: "entry" }),
      ]),
      stmt("list", "broken", [stmt("key", "id missing"), leaf("id", "uint8")], {
        ref: "broken",
      }),
      stmt("list", "prefixed", [stmt("key", "net:id"), leaf("id", "uint16", "prefixed-id")], {
        ref: "prefixed",
      }),
      stmt("list", "chosen", [
        stmt("key", "id"),
        stmt("choice", "c", [stmt("case", "k", [leaf("id", "uint64")])]),
      ], { ref: "chosen" }),
    ]),
  ]);
  const ref = (label: string) => refOf(tree, label);
  const newContext = () => createResolverContext(tree, { rootPackage: "gen" });

  it("should resolve a list's own keys", () => {
    const ctx = newContext();
    const chain = resolveKeyChain(ctx, ref("interface"));
    expect(chain.map((k) => k.name)).to.deep.equal(["name"]);
    expect(chain[0]?.owner.id).to.equal(ref("interface").id);
    expect(chain[0]?.type).to.deep.equal({
      wrapper: "yang.runtime.YangString",
      primitive: "string",
    });
  });

  it("should put enclosing list keys first and disambiguate clashes", () => {
    const ctx = newContext();
    const chain = resolveKeyChain(ctx, ref("address"));
    expect(chain.map((k) => k.name)).to.deep.equal(["name", "addressName", "ip"]);
    expect(chain.map((k) => k.owner.id)).to.deep.equal([
      ref("interface").id,
      ref("address").id,
      ref("address").id,
    ]);
  });

  it("should carry the enclosing keys for non-list nodes", () => {
    const ctx = newContext();
    expect(resolveKeyChain(ctx, ref("stats")).map((k) => k.name)).to.deep.equal([
      "name",
      "addressName",
      "ip",
    ]);
  });

  it("should append a counter when the qualified name clashes too", () => {
    const ctx = newContext();
    expect(resolveKeyChain(ctx, ref("x3")).map((k) => k.name)).to.deep.equal([
      "y",
      "xY",
      "xY2",
    ]);
  });

  it("should strip prefixes from key names", () => {
    const ctx = newContext();
    const chain = resolveKeyChain(ctx, ref("prefixed"));
    expect(chain.map((k) => k.leaf.id)).to.deep.equal([ref("prefixed-id").id]);
    expect(chain[0]?.type.primitive).to.equal("uint16");
  });

  it("should find key leaves inside choice and case", () => {
    const ctx = newContext();
    expect(resolveKeyChain(ctx, ref("chosen"))[0]?.type.primitive).to.equal(
      "uint64"
    );
  });

  it("should warn once about a list without a key statement", () => {
    const ctx = newContext();
    expect(resolveKeyChain(ctx, ref("entry"))).to.deep.equal([]);
    resolveKeyChain(ctx, ref("entry"));
    expect(ctx.warnings.diagnostics.map((d) => d.message)).to.deep.equal([
      "List 'entry' has no key statement",
    ]);
    expect(ctx.warnings.diagnostics[0]?.code).to.equal("YM2004");
  });

  it("should skip and report a key without a matching leaf", () => {
    const ctx = newContext();
    expect(listKeyLeaves(ctx, ref("broken"))).to.have.length(1);
    listKeyLeaves(ctx, ref("broken"));
    expect(ctx.warnings.diagnostics).to.have.length(1);
    expect(ctx.warnings.diagnostics[0]?.code).to.equal("YM2005");
    expect(ctx.warnings.diagnostics[0]?.message).to.equal(
      "Key 'missing' of list 'broken' names no leaf of the list"
    );
  });
});
