import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { tocCommand } from "./toc";

describe("tocCommand", () => {
  let dir: string;
  let level: typeof chalk.level;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mdanchor-toc-cli-"));
    level = chalk.level;
    chalk.level = 0;
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(console, "error").mockImplementation((message) => {
      stderr.push(String(message));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    chalk.level = level;
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it("prints a nested list of heading links", async () => {
    const file = join(dir, "doc.md");
    await writeFile(file, "# Guide\n\n## Setup\n\n## Setup\n");

    await tocCommand(file, {});

    expect(stdout).toEqual(["- [Guide](#guide)\n  - [Setup](#setup)\n  - [Setup](#setup-2)\n"]);
    expect(process.exitCode).toBeUndefined();
  });

  it("uses a custom template", async () => {
    const file = join(dir, "doc.md");
    const template = join(dir, "toc.hbs");
    await writeFile(file, "# A\n## B\n");
    await writeFile(template, "{{#each headings}}{{level}}:{{slug}} {{/each}}");

    await tocCommand(file, { template });

    expect(stdout).toEqual(["1:a 2:b "]);
  });

  it("fails before reading input when the template is missing", async () => {
    await tocCommand(join(dir, "missing.md"), { template: join(dir, "missing.hbs") });

    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^error: ENOENT.*missing\.hbs/);
    expect(process.exitCode).toBe(1);
  });
});
