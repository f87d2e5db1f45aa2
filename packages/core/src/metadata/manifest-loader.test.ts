/**
 * Tests for the universe manifest loader
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { fileURLToPath } from "url";
import {
  loadUniverseManifest,
  parseUniverseManifest,
} from "./manifest-loader.js";
import { createMetadataReflection } from "./reflection.js";
import { formatMember, formatType } from "./type-ops.js";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../../testcases/universes/${name}`, import.meta.url));

describe("Universe Manifest Loader", () => {
  const reflection = createMetadataReflection();

  describe("loadUniverseManifest", () => {
    it("should load and link a valid manifest", () => {
      const result = loadUniverseManifest(fixture("runtime-core.json"));

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.map((m) => m.name)).to.deep.equal([
          "Runtime.Core, Version=4.4.0.0",
          "Sample.Runtime, Version=1.0.0.0",
        ]);
      }
    });

    it("should link generic members with method type parameters", () => {
      const result = loadUniverseManifest(fixture("runtime-core.json"));
      const core = result.ok ? result.value[0] : undefined;
      const list = core
        ? reflection.getType(core, "System.Collections.Generic.List`1")
        : undefined;
      const convertAll = list
        ? reflection.getMethodByName(list, "ConvertAll")
        : undefined;

      expect(convertAll ? formatMember(convertAll) : undefined).to.equal(
        "System.Collections.Generic.List`1[TOutput] ConvertAll[TOutput](Core.Func`2[T,TOutput])"
      );
    });

    it("should link references across modules", () => {
      const result = loadUniverseManifest(fixture("runtime-core.json"));
      const sample = result.ok ? result.value[1] : undefined;
      const parser = sample
        ? reflection.getType(sample, "Sample.Parser")
        : undefined;
      const tryParse = parser
        ? reflection.getMethodByName(parser, "TryParse")
        : undefined;
      const point = sample ? reflection.getType(sample, "Sample.Point") : undefined;

      expect(tryParse ? formatMember(tryParse) : undefined).to.equal(
        "Int32 TryParse(String, Int32&)"
      );
      expect(
        point ? formatMember(reflection.getRecordConstructor(point)) : undefined
      ).to.equal("Void .ctor(Int32, Int32)");
    });

    it("should link union shapes", () => {
      const result = loadUniverseManifest(fixture("runtime-core.json"));
      const core = result.ok ? result.value[0] : undefined;
      const option = core ? reflection.getType(core, "Core.Option`1") : undefined;

      expect(
        option ? reflection.getUnionCases(option).map((c) => c.name) : []
      ).to.deep.equal(["None", "Some"]);
      expect(
        option ? formatType(reflection.getUnionTagMember(option).declaringType) : ""
      ).to.equal("Core.Option`1");
    });

    it("should return error for non-existent file", () => {
      const result = loadUniverseManifest("/nonexistent/universe.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("QSH9001");
      }
    });

    it("should report every schema violation", () => {
      const result = loadUniverseManifest(fixture("broken-schema.json"));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal([
          "QSH9007",
          "QSH9008",
          "QSH9008",
          "QSH9008",
          "QSH9006",
        ]);
        expect(result.error[0]?.message).to.equal(
          "Type needs a string 'fullName' at modules[0].types[1] in broken-schema.json"
        );
      }
    });

    it("should report unresolvable references", () => {
      const result = loadUniverseManifest(fixture("unresolved.json"));

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal([
          "QSH9010",
          "QSH9012",
          "QSH9009",
          "QSH9012",
          "QSH9011",
          "QSH9011",
        ]);
        expect(result.error[2]?.message).to.equal(
          "Unknown type 'Sample.Missing' at modules[0].types[3].methods[0].parameters[0] in unresolved.json"
        );
      }
    });
  });

  describe("parseUniverseManifest", () => {
    it("should reject invalid JSON", () => {
      const result = parseUniverseManifest("{ modules: ", "inline.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("QSH9003");
      }
    });

    it("should reject a non-object document", () => {
      const result = parseUniverseManifest("[]", "inline.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.message).to.equal(
          "Universe manifest must be an object, got array in inline.json"
        );
      }
    });

    it("should reject a missing modules list", () => {
      const result = parseUniverseManifest("{}", "inline.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("QSH9005");
      }
    });

    it("should require a union case constructor to be a static method", () => {
      const result = parseUniverseManifest(
        JSON.stringify({
          modules: [
            {
              name: "Tiny",
              types: [
                { fullName: "System.Int32" },
                {
                  fullName: "Sample.Light",
                  properties: [
                    { name: "Tag", type: "System.Int32" },
                    { name: "Red", type: "Sample.Light", isStatic: true },
                  ],
                  union: {
                    tagMember: { kind: "property", name: "Tag" },
                    cases: [{ name: "Red", tag: 0, constructorName: "Red" }],
                  },
                },
              ],
            },
          ],
        }),
        "inline.json"
      );

      expect(result.ok ? [] : result.error.map((d) => d.message)).to.deep.equal([
        "Union case 'Red' names missing static constructor 'Red' at modules[0].types[1].union in inline.json",
      ]);
    });

    it("should map System.Void to the canonical void type", () => {
      const result = parseUniverseManifest(
        JSON.stringify({
          modules: [
            {
              name: "Tiny",
              types: [
                {
                  fullName: "Sample.Runner",
                  methods: [{ name: "Run", returnType: "System.Void" }],
                },
              ],
            },
          ],
        }),
        "inline.json"
      );
      const tiny = result.ok ? result.value[0] : undefined;
      const runner = tiny ? reflection.getType(tiny, "Sample.Runner") : undefined;
      const run = runner ? reflection.getMethodByName(runner, "Run") : undefined;

      expect(run ? formatMember(run) : undefined).to.equal("Void Run()");
    });
  });
});
