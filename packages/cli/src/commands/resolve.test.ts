/**
 * Tests for the resolve command and the CLI dispatcher
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCli } from "../cli/dispatcher.js";
import type { ResolvedConfig } from "../types.js";
import { resolveCommand } from "./resolve.js";

const typeOf = (name: string, extra: Record<string, string> = {}) => ({
  keyword: "type",
  arg: name,
  ...extra,
});

const bundle = {
  modules: [
    {
      keyword: "module",
      arg: "acme",
      children: [
        { keyword: "typedef", arg: "port", ref: "port", children: [typeOf("uint16")] },
        {
          keyword: "container",
          arg: "system",
          children: [
            { keyword: "leaf", arg: "hostname", children: [typeOf("string")] },
            {
              keyword: "list",
              arg: "server",
              children: [
                { keyword: "key", arg: "name" },
                { keyword: "leaf", arg: "name", children: [typeOf("string")] },
                {
                  keyword: "leaf",
                  arg: "port",
                  children: [typeOf("port", { typedef: "port" })],
                },
              ],
            },
          ],
        },
        {
          keyword: "rpc",
          arg: "restart",
          children: [
            {
              keyword: "input",
              children: [
                { keyword: "leaf", arg: "delay", children: [typeOf("uint32")] },
              ],
            },
          ],
        },
      ],
    },
  ],
  diagnostics: [{ tag: "FEATURE_NOT_FOUND", severity: "warning", module: "acme" }],
};

const expectedReport = {
  rootPackage: "org.example",
  augmentedModules: [],
  units: [
    {
      kind: "container",
      phase: "primary",
      tagpath: "system",
      member: "system",
      type: "System",
      modelPackage: "org.example.model.acme",
      apiPackage: "org.example.api.acme",
      keys: [],
      leaves: [
        {
          name: "hostname",
          wrapper: "yang.runtime.YangString",
          primitive: "string",
          multiple: false,
          isKey: false,
        },
      ],
      children: ["system/server"],
    },
    {
      kind: "list",
      phase: "primary",
      tagpath: "system/server",
      member: "server",
      type: "Server",
      modelPackage: "org.example.model.acme.system",
      apiPackage: "org.example.api.acme.system",
      keys: [
        { name: "name", wrapper: "yang.runtime.YangString", primitive: "string" },
      ],
      leaves: [
        {
          name: "name",
          wrapper: "yang.runtime.YangString",
          primitive: "string",
          multiple: false,
          isKey: true,
        },
        {
          name: "port",
          wrapper: "org.example.model.acme.Port",
          primitive: "uint16",
          multiple: false,
          isKey: false,
        },
      ],
      children: [],
    },
    {
      kind: "rpc",
      phase: "primary",
      tagpath: "restart",
      member: "restart",
      type: "Restart",
      modelPackage: "org.example.model.acme",
      apiPackage: "org.example.api.acme",
      keys: [],
      leaves: [
        {
          name: "delay",
          wrapper: "yang.runtime.YangUInt32",
          primitive: "uint32",
          multiple: false,
          isKey: false,
          direction: "input",
        },
      ],
      children: [],
    },
  ],
};

describe("resolve command", () => {
  let tempDir: string;
  let bundlePath: string;

  const configFor = (output: string): ResolvedConfig => ({
    rootPackage: "org.example",
    runtimePackage: "yang.runtime",
    ignoreErrors: false,
    includeImports: false,
    reservedWords: [],
    output,
    verbose: false,
    quiet: true,
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "yangmodel-resolve-"));
    bundlePath = path.join(tempDir, "schema.json");
    fs.writeFileSync(bundlePath, JSON.stringify(bundle));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write the model report", () => {
    const output = path.join(tempDir, "out", "model.json");

    const result = resolveCommand(bundlePath, configFor(output));

    expect(result).to.deep.equal({
      ok: true,
      value: {
        unitCount: 3,
        warningCount: 1,
        augmentedModules: [],
        outputPath: output,
      },
    });
    const report: unknown = JSON.parse(fs.readFileSync(output, "utf-8"));
    expect(report).to.deep.equal(expectedReport);
  });

  it("should fail for a missing bundle", () => {
    const missing = path.join(tempDir, "missing.json");
    const result = resolveCommand(missing, configFor(path.join(tempDir, "m.json")));
    expect(result).to.deep.equal({
      ok: false,
      error: `Failed to load schema bundle ${missing}`,
    });
  });

  it("should fail when the validator reports the module missing", () => {
    fs.writeFileSync(
      bundlePath,
      JSON.stringify({
        ...bundle,
        diagnostics: [{ tag: "MODULE_NOT_FOUND", severity: "error", module: "acme" }],
      })
    );
    const output = path.join(tempDir, "model.json");

    const result = resolveCommand(bundlePath, configFor(output));

    expect(result).to.deep.equal({ ok: false, error: "Resolution failed" });
    expect(fs.existsSync(output)).to.equal(false);
  });

  describe("runCli", () => {
    it("should resolve with an explicit config file", async () => {
      const configPath = path.join(tempDir, "yangmodel.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({ rootPackage: "org.example", output: "model.json" })
      );

      const exitCode = await runCli(["resolve", bundlePath, "-c", configPath, "-q"]);

      expect(exitCode).to.equal(0);
      const report: unknown = JSON.parse(
        fs.readFileSync(path.join(tempDir, "model.json"), "utf-8")
      );
      expect(report).to.deep.equal(expectedReport);
    });

    it("should exit with 1 without a bundle path", async () => {
      expect(await runCli(["resolve", "-q"])).to.equal(1);
    });

    it("should exit with 2 for an unknown command", async () => {
      expect(await runCli(["emit"])).to.equal(2);
    });
  });
});
