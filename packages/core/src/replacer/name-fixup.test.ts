/**
 * Tests for interactive-host name fix-up
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { fixName, findTypeInModule, isInteractiveModule } from "./name-fixup.js";
import { DEFAULT_INTERACTIVE_HOST_NAMING } from "./types.js";
import { createModule } from "../metadata/builder.js";
import { createMetadataReflection } from "../metadata/reflection.js";

describe("Name Fix-up", () => {
  const naming = DEFAULT_INTERACTIVE_HOST_NAMING;
  const reflection = createMetadataReflection();

  describe("fixName", () => {
    it("should strip the submission segment", () => {
      expect(fixName(naming, "FSI_0002.Sample.Widget")).to.equal("Sample.Widget");
    });

    it("should leave other names alone", () => {
      expect(fixName(naming, "Sample.Widget")).to.equal("Sample.Widget");
    });

    it("should honour a custom prefix", () => {
      const custom = { ...naming, namespacePrefix: "Submission#" };
      expect(fixName(custom, "Submission#3.Sample.Widget")).to.equal(
        "Sample.Widget"
      );
      expect(fixName(custom, "FSI_0002.Sample.Widget")).to.equal(
        "FSI_0002.Sample.Widget"
      );
    });
  });

  describe("findTypeInModule", () => {
    const interactive = createModule("FSI-ASSEMBLY, Version=0.0.0.0");
    const first = interactive.defineType({ fullName: "FSI_0001.Sample.Widget" });
    const third = interactive.defineType({ fullName: "FSI_0003.Sample.Widget" });
    const second = interactive.defineType({ fullName: "FSI_0002.Sample.Widget" });

    it("should recognise interactive modules by name", () => {
      expect(isInteractiveModule(naming, interactive.module)).to.equal(true);
    });

    it("should pick the lexicographically last submission, unstable", () => {
      const found = findTypeInModule(
        reflection,
        naming,
        "Sample.Widget",
        interactive.module
      );
      expect(found?.type).to.equal(third.definition);
      expect(found?.stable).to.equal(false);
      expect([first.definition, second.definition]).to.not.include(found?.type);
    });

    it("should look ordinary modules up by exact name, stable", () => {
      const ordinary = createModule("Sample.Runtime");
      const widget = ordinary.defineType({ fullName: "Sample.Widget" });
      const found = findTypeInModule(
        reflection,
        naming,
        "Sample.Widget",
        ordinary.module
      );
      expect(found?.type).to.equal(widget.definition);
      expect(found?.stable).to.equal(true);
    });

    it("should answer undefined when nothing matches", () => {
      expect(
        findTypeInModule(reflection, naming, "Sample.Gadget", interactive.module)
      ).to.equal(undefined);
    });
  });
});
