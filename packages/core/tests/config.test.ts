import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { config, createLogger, defineConfig, PrimerError } from "@erasure-primer/core";
import type { LogLevel } from "@erasure-primer/core";

beforeEach(() => {
  config.reset();
});

afterEach(() => {
  vi.unstubAllEnvs();
  config.reset();
});

describe("config", () => {
  it("starts from defaults", () => {
    expect(config.isDebug()).toBe(false);
    expect(config.verifiesOpaque()).toBe(true);
    expect(config.fractionDigits()).toBe(1);
    expect(config.get("output.colors")).toBe(true);
  });

  it("merges programmatic values deeply", () => {
    config.set({ output: { fractionDigits: 3 } });
    expect(config.fractionDigits()).toBe(3);
    expect(config.useColors()).toBe(true);
  });

  it("reads environment overrides", () => {
    vi.stubEnv("ERASURE_PRIMER_OPAQUE_VERIFY", "0");
    vi.stubEnv("ERASURE_PRIMER_OUTPUT_FRACTION_DIGITS", "2");
    vi.stubEnv("ERASURE_PRIMER_DEBUG", "true");
    config.reset();
    expect(config.verifiesOpaque()).toBe(false);
    expect(config.fractionDigits()).toBe(2);
    expect(config.isDebug()).toBe(true);
    expect(config.has("debug")).toBe(true);
  });

  it("rejects out-of-range fraction digits with EP1008", () => {
    config.set({ output: { fractionDigits: 25 } });
    expect(() => config.fractionDigits()).toThrow(PrimerError);
    expect(() => config.fractionDigits()).toThrow(
      "invalid configuration value for `output.fractionDigits`: expected an integer between 0 and 20, found 25",
    );
  });

  it("rejects non-boolean flags", () => {
    vi.stubEnv("ERASURE_PRIMER_DEBUG", "loud");
    config.reset();
    expect(() => config.isDebug()).toThrow(
      'invalid configuration value for `debug`: expected a boolean, found "loud"',
    );
  });

  it("defineConfig is the identity", () => {
    const cfg = { debug: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

describe("createLogger", () => {
  const collect = () => {
    const lines: Array<[LogLevel, string]> = [];
    return { lines, sink: (level: LogLevel, line: string) => lines.push([level, line]) };
  };

  it("prefixes lines with the scope", () => {
    const { lines, sink } = collect();
    const log = createLogger("erased", sink);
    log.info("hello");
    log.warn("careful");
    expect(lines).toEqual([
      ["info", "[erasure-primer:erased] hello"],
      ["warn", "[erasure-primer:erased] careful"],
    ]);
  });

  it("writes debug lines only in debug mode", () => {
    const { lines, sink } = collect();
    const log = createLogger("opaque", sink);
    log.debug("hidden");
    config.set({ debug: true });
    log.debug("shown");
    expect(lines).toEqual([["debug", "[erasure-primer:opaque] shown"]]);
  });
});

describe("config numeric env values", () => {
  it("reads a zero digit count as a number", () => {
    vi.stubEnv("ERASURE_PRIMER_OUTPUT_FRACTION_DIGITS", "0");
    config.reset();
    expect(config.fractionDigits()).toBe(0);
  });
});

describe("config file and priority", () => {
  const originalCwd = process.cwd();
  let dir: string;
  let rcPath: string;

  beforeEach(() => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "erasure-primer-config-")));
    rcPath = path.join(dir, ".erasure-primerrc.json");
    fs.writeFileSync(
      rcPath,
      JSON.stringify({ opaque: { verify: false }, output: { fractionDigits: 3 } }),
    );
    process.chdir(dir);
    config.reset();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads the rc file from the working directory", () => {
    expect(config.getConfigFilePath()).toBe(rcPath);
    expect(config.fractionDigits()).toBe(3);
    expect(config.verifiesOpaque()).toBe(false);
    expect(config.isDebug()).toBe(false);
  });

  it("environment overrides the file", () => {
    vi.stubEnv("ERASURE_PRIMER_OUTPUT_FRACTION_DIGITS", "2");
    config.reset();
    expect(config.fractionDigits()).toBe(2);
    expect(config.verifiesOpaque()).toBe(false);
  });

  it("config.set() overrides the environment", () => {
    vi.stubEnv("ERASURE_PRIMER_OUTPUT_FRACTION_DIGITS", "2");
    config.reset();
    config.set({ output: { fractionDigits: 4 } });
    expect(config.fractionDigits()).toBe(4);
  });

  it("getAll returns the merged configuration", () => {
    expect(config.getAll()).toEqual({
      debug: false,
      opaque: { verify: false },
      output: { fractionDigits: 3, colors: true },
    });
  });

  it("getAll returns a copy", () => {
    const all = config.getAll();
    Reflect.set(all, "debug", true);
    const output = all.output;
    if (output !== undefined) Reflect.set(output, "fractionDigits", 9);
    expect(config.isDebug()).toBe(false);
    expect(config.fractionDigits()).toBe(3);
  });
});
