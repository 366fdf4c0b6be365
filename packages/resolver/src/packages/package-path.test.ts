import { describe, it } from "mocha";
import { expect } from "chai";
import { createTestTree, refOf, stmt } from "@yangmodel/frontend";
import { createResolverContext } from "../context.js";
import { packagePath } from "./package-path.js";

describe("Package-Path Resolver", () => {
  const tree = createTestTree([
    stmt("module", "acme", [
      stmt("container", "a", [
        stmt("choice", "ch", [
          stmt("case", "cs", [
            stmt("container", "b", [
              stmt("container", "c", [stmt("leaf", "deep", [], { ref: "deep" })], {
                ref: "c",
              }),
            ]),
          ]),
        ]),
      ], { ref: "a" }),
      stmt("rpc", "reset", [
        stmt("input", undefined, [stmt("leaf", "delay", [], { ref: "delay" })]),
        stmt("output", undefined, [stmt("leaf", "status", [], { ref: "status" })]),
      ]),
      stmt("notification", "alarm", [
        stmt("leaf", "severity", [], { ref: "severity" }),
      ]),
      stmt("container", "class", [stmt("leaf", "x", [], { ref: "x" })]),
    ], { ref: "acme" }),
    stmt(
      "submodule",
      "acme-extra",
      [stmt("container", "extras", [stmt("leaf", "e", [], { ref: "e" })], { ref: "extras" })],
      { belongsTo: "acme" }
    ),
    stmt("module", "other", [
      stmt("augment", "/acme:a", [stmt("leaf", "injected", [], { ref: "injected" })], {
        augment: "a",
      }),
    ]),
  ]);
  const ref = (label: string) => refOf(tree, label);
  const newContext = () =>
    createResolverContext(tree, { rootPackage: "org.example.gen" });

  it("should put a module's own package at the variant root", () => {
    const ctx = newContext();
    expect(packagePath(ctx, ref("acme"), "model").parts).to.deep.equal([
      "org",
      "example",
      "gen",
      "model",
    ]);
  });

  it("should add one segment per container and none for choice or case", () => {
    const ctx = newContext();
    const path = packagePath(ctx, ref("deep"), "model");
    expect(path.parts).to.deep.equal([
      "org",
      "example",
      "gen",
      "model",
      "acme",
      "a",
      "b",
      "c",
    ]);
    expect(path.qualifiedName).to.equal("org.example.gen.model.acme.a.b.c");
  });

  it("should differ between variants only in the variant segment", () => {
    const ctx = newContext();
    const model = packagePath(ctx, ref("c"), "model");
    const api = packagePath(ctx, ref("c"), "api");
    expect(api.qualifiedName).to.equal("org.example.gen.api.acme.a.b");
    expect(api.parts.filter((_, i) => i !== 3)).to.deep.equal(
      model.parts.filter((_, i) => i !== 3)
    );
  });

  it("should use the keyword for input and output segments", () => {
    const ctx = newContext();
    expect(packagePath(ctx, ref("delay"), "model").qualifiedName).to.equal(
      "org.example.gen.model.acme.reset.input"
    );
    expect(packagePath(ctx, ref("status"), "model").qualifiedName).to.equal(
      "org.example.gen.model.acme.reset.output"
    );
  });

  it("should add a segment for notifications", () => {
    const ctx = newContext();
    expect(packagePath(ctx, ref("severity"), "api").qualifiedName).to.equal(
      "org.example.gen.api.acme.alarm"
    );
  });

  it("should escape reserved segments", () => {
    const ctx = newContext();
    expect(packagePath(ctx, ref("x"), "model").qualifiedName).to.equal(
      "org.example.gen.model.acme.class_"
    );
  });

  it("should add the submodule segment below the main module", () => {
    const ctx = newContext();
    expect(packagePath(ctx, ref("extras"), "model").qualifiedName).to.equal(
      "org.example.gen.model.acme.acmeExtra"
    );
    expect(packagePath(ctx, ref("e"), "model").qualifiedName).to.equal(
      "org.example.gen.model.acme.acmeExtra.extras"
    );
  });

  it("should place augment content in the target's package", () => {
    const ctx = newContext();
    expect(packagePath(ctx, ref("injected"), "model").qualifiedName).to.equal(
      "org.example.gen.model.acme.a"
    );
  });

  it("should return the same path on repeated calls", () => {
    const ctx = newContext();
    const first = packagePath(ctx, ref("deep"), "model");
    expect(packagePath(ctx, ref("deep"), "model")).to.equal(first);
    expect(packagePath(newContext(), ref("deep"), "model")).to.deep.equal(first);
  });
});
