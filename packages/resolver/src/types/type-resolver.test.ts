import { describe, it } from "mocha";
import { expect } from "chai";
import { createTestTree, refOf, stmt } from "@yangmodel/frontend";
import { createResolverContext } from "../context.js";
import { resolveType } from "./type-resolver.js";

const typed = (
  name: string,
  type: string,
  extra: { typedef?: string; leafref?: string } = {}
) => stmt("leaf", name, [stmt("type", type, [], extra)], { ref: name });

describe("Type Resolver", () => {
  const tree = createTestTree([
    stmt("module", "m", [
      stmt("typedef", "t1", [stmt("type", "uint32")], { ref: "t1" }),
      stmt("typedef", "t2", [stmt("type", "t1", [], { typedef: "t1" })], { ref: "t2" }),
      stmt("typedef", "t3", [stmt("type", "t2", [], { typedef: "t2" })], { ref: "t3" }),
      stmt("grouping", "g", [
        stmt("typedef", "nested", [stmt("type", "int8")], { ref: "nested" }),
        typed("grouped", "nested", { typedef: "nested" }),
      ]),
      stmt("container", "c", [
        typed("derived", "t3", { typedef: "t3" }),
        typed("plain", "uint32"),
        typed("target", "uint16"),
        typed("pointer", "leafref", { leafref: "target" }),
        typed("dangling", "leafref"),
        typed("port-a", "inet:port-number"),
        typed("port-b", "inet:port-number"),
        typed("flag", "empty"),
        typed("mask", "bits"),
        typed("ratio", "decimal64"),
        typed("from-sub", "shared", { typedef: "shared" }),
        stmt("leaf-list", "tags", [stmt("type", "string")], { ref: "tags" }),
        stmt("leaf", "bare", [], { ref: "bare" }),
      ]),
    ], { ref: "m" }),
    stmt(
      "submodule",
      "m-types",
      [stmt("typedef", "shared", [stmt("type", "int64")], { ref: "shared" })],
      { belongsTo: "m" }
    ),
  ]);
  const ref = (label: string) => refOf(tree, label);
  const newContext = () =>
    createResolverContext(tree, { rootPackage: "org.example" });

  describe("built-in types", () => {
    it("should map integers to their wrapper and width", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("plain"))).to.deep.equal({
        wrapper: "yang.runtime.YangUInt32",
        primitive: "uint32",
      });
    });

    it("should collapse empty to string, bits to big-integer and decimal64 to decimal", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("flag")).primitive).to.equal("string");
      expect(resolveType(ctx, ref("mask"))).to.deep.equal({
        wrapper: "yang.runtime.YangBits",
        primitive: "big-integer",
      });
      expect(resolveType(ctx, ref("ratio"))).to.deep.equal({
        wrapper: "yang.runtime.YangDecimal64",
        primitive: "decimal",
      });
    });

    it("should resolve leaf-list through its type statement", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("tags")).wrapper).to.equal(
        "yang.runtime.YangString"
      );
    });

    it("should qualify wrappers with the configured runtime package", () => {
      const ctx = createResolverContext(tree, {
        rootPackage: "org.example",
        runtimePackage: "rt",
      });
      expect(resolveType(ctx, ref("plain")).wrapper).to.equal("rt.YangUInt32");
    });
  });

  describe("typedef chains", () => {
    it("should keep the base kind and use the outermost typedef name", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("derived"))).to.deep.equal({
        wrapper: "org.example.model.m.T3",
        primitive: "uint32",
      });
      expect(resolveType(ctx, ref("derived")).primitive).to.equal(
        resolveType(ctx, ref("plain")).primitive
      );
    });

    it("should resolve a typedef statement directly", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("t2"))).to.deep.equal({
        wrapper: "org.example.model.m.T1",
        primitive: "uint32",
      });
    });

    it("should not qualify typedefs nested in a grouping", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("grouped"))).to.deep.equal({
        wrapper: "yang.runtime.YangInt8",
        primitive: "int8",
      });
    });

    it("should qualify submodule typedefs with the submodule segment", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("from-sub"))).to.deep.equal({
        wrapper: "org.example.model.m.mTypes.Shared",
        primitive: "int64",
      });
    });
  });

  describe("leafref", () => {
    it("should take the type of the target leaf", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("pointer"))).to.deep.equal({
        wrapper: "yang.runtime.YangUInt16",
        primitive: "uint16",
      });
    });

    it("should fall back to string when the target is missing", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("dangling")).primitive).to.equal("string");
      expect(ctx.warnings.diagnostics.map((d) => d.code)).to.deep.equal([
        "YM2002",
      ]);
    });
  });

  describe("degraded resolution", () => {
    it("should warn once per package and type name", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("port-a"))).to.deep.equal({
        wrapper: "yang.runtime.YangString",
        primitive: "string",
      });
      resolveType(ctx, ref("port-b"));

      expect(ctx.warnings.diagnostics).to.have.length(1);
      const [warning] = ctx.warnings.diagnostics;
      expect(warning?.code).to.equal("YM2001");
      expect(warning?.severity).to.equal("warning");
      expect(warning?.message).to.equal(
        "Type 'inet:port-number' in org.example.model.m.c could not be resolved; using string"
      );
    });

    it("should warn about a leaf without a type statement", () => {
      const ctx = newContext();
      expect(resolveType(ctx, ref("bare")).primitive).to.equal("string");
      expect(ctx.warnings.diagnostics[0]?.message).to.equal(
        "leaf 'bare' has no type statement; using string"
      );
    });
  });

  it("should memoize per node", () => {
    const ctx = newContext();
    const first = resolveType(ctx, ref("derived"));
    expect(resolveType(ctx, ref("derived"))).to.equal(first);
    expect(ctx.typeCache.size).to.be.greaterThan(0);
  });
});
