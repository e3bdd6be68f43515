import { describe, expect, it } from "vitest";
import { parseArgs, toNamingOptions, toParserOptions } from "./args";
import { UsageError } from "./errors";

describe("parseArgs", () => {
  it("fills in defaults", () => {
    expect(parseArgs(["mix.txt"])).toEqual({
      timingFiles: ["mix.txt"],
      source: null,
      outputDir: null,
      format: "line",
      separator: " - ",
      template: "{{artist}} - {{title}}",
      extension: null,
      album: null,
      policy: "abort",
      dryRun: false,
      resume: false,
      tags: true,
      help: false,
    });
  });

  it("reads the source and every option", () => {
    const options = parseArgs([
      "mix.txt",
      "--source",
      "https://example.com/mix.mp3",
      "-o",
      "tracks",
      "--format=pipe",
      "--separator",
      " / ",
      "-t",
      "{{trackNumber}} {{title}}",
      "-e",
      "flac",
      "--album",
      "Live Set",
      "--continue",
      "--dry-run",
      "--resume",
      "--no-tags",
    ]);

    expect(options).toMatchObject({
      timingFiles: ["mix.txt"],
      source: "https://example.com/mix.mp3",
      outputDir: "tracks",
      format: "pipe",
      separator: " / ",
      template: "{{trackNumber}} {{title}}",
      extension: "flac",
      album: "Live Set",
      policy: "continue",
      dryRun: true,
      resume: true,
      tags: false,
    });
  });

  it("takes several timing files", () => {
    expect(parseArgs(["side-a.txt", "--dry-run", "side-b.txt"])).toMatchObject({
      timingFiles: ["side-a.txt", "side-b.txt"],
      source: null,
      dryRun: true,
    });
  });

  it("reads the short source flag", () => {
    expect(parseArgs(["mix.txt", "-i", "mix.flac"]).source).toBe("mix.flac");
  });

  it("allows --help without a timing file", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it.each<[string[]]>([
    [[]],
    [["side-a.txt", "side-b.txt", "--source", "mix.mp3"]],
    [["mix.txt", "--source"]],
    [["mix.txt", "--bogus"]],
    [["mix.txt", "--format", "csv"]],
    [["mix.txt", "--output"]],
    [["mix.txt", "--template", "{{genre}}"]],
    [["mix.txt", "--separator="]],
  ])("rejects %j", (argv) => {
    expect(() => parseArgs(argv)).toThrow(UsageError);
  });
});

describe("option mapping", () => {
  it("builds parser and naming options", () => {
    const options = parseArgs(["mix.txt", "-f", "pipe", "-a", "Tape"]);
    expect(toParserOptions(options)).toEqual({ format: "pipe", separator: " - ", commentMarker: "#" });
    expect(toNamingOptions(options)).toEqual({ template: "{{artist}} - {{title}}", maxLength: 180, album: "Tape" });
    expect(toNamingOptions(parseArgs(["mix.txt"]))).not.toHaveProperty("album");
  });
});
