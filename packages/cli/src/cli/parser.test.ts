/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse a bare command", () => {
        const result = parseArgs(["classes"]);
        expect(result.command).to.equal("classes");
        expect(result.positionals).to.deep.equal([]);
      });

      it("should collect positionals after the command", () => {
        const result = parseArgs(["invoke", "::Counter", "Add", "5"]);
        expect(result.command).to.equal("invoke");
        expect(result.positionals).to.deep.equal(["::Counter", "Add", "5"]);
      });

      it("should return an empty command when none is given", () => {
        expect(parseArgs([]).command).to.equal("");
      });

      it("should parse help command from --help", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
      });

      it("should parse help command from -h anywhere", () => {
        expect(parseArgs(["describe", "::Bar", "-h"]).command).to.equal("help");
      });

      it("should parse version command from -v and --version", () => {
        expect(parseArgs(["-v"]).command).to.equal("version");
        expect(parseArgs(["--version"]).command).to.equal("version");
      });
    });

    describe("Operands", () => {
      it("should treat negative numbers as operands", () => {
        const result = parseArgs(["eval", "Add", "-5", "-2.5"]);
        expect(result.positionals).to.deep.equal(["Add", "-5", "-2.5"]);
      });

      it("should treat a lone dash as an operand", () => {
        const result = parseArgs(["eval", "-", "4"]);
        expect(result.positionals).to.deep.equal(["-", "4"]);
      });

      it("should take everything after -- as operands", () => {
        const result = parseArgs(["invoke", "::Echo", "Say", "--", "-V", "--"]);
        expect(result.positionals).to.deep.equal(["::Echo", "Say", "-V", "--"]);
        expect(result.options.verbose).to.equal(undefined);
      });

      it("should keep unknown options as operands", () => {
        const result = parseArgs(["invoke", "::Echo", "Say", "--loud"]);
        expect(result.positionals).to.deep.equal(["::Echo", "Say", "--loud"]);
      });
    });

    describe("Options", () => {
      it("should parse --verbose and -V", () => {
        expect(parseArgs(["classes", "--verbose"]).options.verbose).to.equal(
          true
        );
        expect(parseArgs(["classes", "-V"]).options.verbose).to.equal(true);
      });

      it("should parse --quiet and -q", () => {
        expect(parseArgs(["classes", "--quiet"]).options.quiet).to.equal(true);
        expect(parseArgs(["classes", "-q"]).options.quiet).to.equal(true);
      });

      it("should parse --config with its value", () => {
        const result = parseArgs(["describe", "-c", "conf/app.json", "::Bar"]);
        expect(result.options.config).to.equal("conf/app.json");
        expect(result.positionals).to.deep.equal(["::Bar"]);
      });

      it("should accept options before the command", () => {
        const result = parseArgs(["--config", "metareflect.json", "classes"]);
        expect(result.command).to.equal("classes");
        expect(result.options.config).to.equal("metareflect.json");
      });

      it("should default a missing --config value to empty", () => {
        expect(parseArgs(["classes", "--config"]).options.config).to.equal("");
      });
    });
  });
});
