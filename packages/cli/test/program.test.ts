/**
 * In-process tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { openUserStore } from "@userstore/sdk";
import { createProgram, run, VERSION } from "../src/program.js";

const stdin = vi.hoisted(() => ({ tty: false, content: "" }));

vi.mock("../src/lib/io.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/lib/io.js")>();
  return {
    ...actual,
    isStdinTTY: () => stdin.tty,
    readStdin: async () => stdin.content,
  };
});

/**
 * Run the CLI in-process, capturing console and commander output
 */
async function runCli(
  args: string[]
): Promise<{ stdout: string; stderr: string; exitCode: number }> {
  const out: string[] = [];
  const err: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    out.push(parts.map(String).join(" "));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...parts: unknown[]) => {
    err.push(parts.map(String).join(" "));
  });

  try {
    const program = createProgram({
      writeOut: (str) => out.push(str.trimEnd()),
      writeErr: (str) => err.push(str.trimEnd()),
    });
    const exitCode = await run(args, program);
    return { stdout: out.join("\n"), stderr: err.join("\n"), exitCode };
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
}

describe("CLI", () => {
  let tmpDir: string;
  let dataFile: string;
  let originalFile: string | undefined;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "userstore-cli-"));
    dataFile = path.join(tmpDir, "data", "users.json");
    originalFile = process.env.USERSTORE_FILE;
    delete process.env.USERSTORE_FILE;
    delete process.env.USERSTORE_CLI_DEBUG;
    stdin.tty = false;
    stdin.content = "";
  });

  afterEach(async () => {
    if (originalFile !== undefined) {
      process.env.USERSTORE_FILE = originalFile;
    } else {
      delete process.env.USERSTORE_FILE;
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("init", () => {
    it("should create the data directory and an empty collection", async () => {
      const result = await runCli(["--file", dataFile, "init"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toContain(`Initialized ${dataFile}`);
      expect(await fs.readFile(dataFile, "utf8")).toBe("[]\n");
    });

    it("should stay quiet with --quiet", async () => {
      const result = await runCli(["--file", dataFile, "--quiet", "init"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("");
    });
  });

  describe("list", () => {
    it("should print an empty array when the file does not exist", async () => {
      const result = await runCli(["--file", path.join(tmpDir, "users.json"), "list"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe("[]");
    });

    it("should print compact JSON with --raw", async () => {
      await runCli(["--file", dataFile, "init"]);
      await runCli(["--file", dataFile, "add", "--id", "u1", "--name", "Ada"]);

      const result = await runCli(["--file", dataFile, "list", "--raw"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).not.toContain("\n");
      expect(JSON.parse(result.stdout)).toEqual([{ id: "u1", name: "Ada" }]);
    });

    it("should exit 4 on a corrupt data file", async () => {
      await fs.mkdir(path.dirname(dataFile), { recursive: true });
      await fs.writeFile(dataFile, "{ not json");

      const result = await runCli(["--file", dataFile, "list"]);

      expect(result.exitCode).toBe(4);
      expect(result.stderr).toBe(`Error: Corrupt snapshot in ${dataFile}: content does not parse`);
    });

    it("should read the data file from USERSTORE_FILE", async () => {
      process.env.USERSTORE_FILE = dataFile;
      await runCli(["init"]);
      await runCli(["add", "--id", "env", "--name", "From Env"]);

      const result = await runCli(["list"]);

      expect(JSON.parse(result.stdout)).toEqual([{ id: "env", name: "From Env" }]);
    });

    it("should exit 1 when the data directory does not exist", async () => {
      const listed = await runCli(["--file", dataFile, "list"]);
      const fetched = await runCli(["--file", dataFile, "get", "u1"]);

      const expected = `Error: Storage unavailable: ${dataFile}.lock (cannot create lock file)`;
      expect(listed.exitCode).toBe(1);
      expect(listed.stderr).toBe(expected);
      expect(fetched.exitCode).toBe(1);
      expect(fetched.stderr).toBe(expected);
      await expect(fs.access(path.dirname(dataFile))).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("should emit a metric line with --verbose", async () => {
      await runCli(["--file", dataFile, "init"]);
      const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

      try {
        await runCli(["--file", dataFile, "--verbose", "list"]);
        const lines = write.mock.calls.map(([chunk]) => String(chunk));
        expect(lines.some((line) => line.startsWith("metric cli.list duration_ms="))).toBe(true);
        expect(lines.some((line) => line.endsWith(" success=true\n"))).toBe(true);
      } finally {
        write.mockRestore();
      }
    });
  });

  describe("add", () => {
    beforeEach(async () => {
      await runCli(["--file", dataFile, "init"]);
    });

    it("should create a user from field flags", async () => {
      const result = await runCli([
        "--file",
        dataFile,
        "add",
        "--id",
        "u1",
        "--name",
        "Ada",
        "--email",
        "ada@example.com",
      ]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({ id: "u1", name: "Ada", email: "ada@example.com" });
    });

    it("should generate an identifier for --data input", async () => {
      const result = await runCli(["--file", dataFile, "add", "--data", '{"name":"Grace"}']);

      expect(result.exitCode).toBe(0);
      const user: unknown = JSON.parse(result.stdout);
      expect(user).toMatchObject({ name: "Grace", id: expect.stringMatching(/^[0-9a-f-]{36}$/) });
    });

    it("should read a record from --file-input", async () => {
      const input = path.join(tmpDir, "input.json");
      await fs.writeFile(input, '{"id":"f1","name":"From File","phone":"555-0100"}');

      const result = await runCli(["--file", dataFile, "add", "--file-input", input]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({ id: "f1", name: "From File", phone: "555-0100" });
    });

    it("should read a record from stdin", async () => {
      stdin.content = '{"id":"s1","name":"Piped"}\n';

      const result = await runCli(["--file", dataFile, "add"]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({ id: "s1", name: "Piped" });
    });

    it("should reject empty stdin", async () => {
      stdin.content = "  \n";

      const result = await runCli(["--file", dataFile, "add"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: stdin is empty");
    });

    it("should require input when stdin is a terminal", async () => {
      stdin.tty = true;

      const result = await runCli(["--file", dataFile, "add"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: No input provided. Use --name, --data, --file-input, or pipe JSON to stdin"
      );
    });

    it("should reject more than one input source", async () => {
      const result = await runCli([
        "--file",
        dataFile,
        "add",
        "--name",
        "Ada",
        "--data",
        '{"name":"Grace"}',
      ]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: Use only one of the field flags, --data or --file-input; or pipe JSON to stdin"
      );
    });

    it("should reject invalid JSON in --data", async () => {
      const result = await runCli(["--file", dataFile, "add", "--data", "{nope"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr.startsWith("Error: Invalid JSON in --data:")).toBe(true);
    });

    it("should exit 1 on validation failure and leave the file untouched", async () => {
      const result = await runCli(["--file", dataFile, "add", "--name", "Ada", "--email", "nope"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "Error: Record failed validation: /email email must be a valid e-mail address"
      );
      expect(await fs.readFile(dataFile, "utf8")).toBe("[]\n");
    });

    it("should reject an id with surrounding whitespace from any source", async () => {
      const fromData = await runCli(["--file", dataFile, "add", "--data", '{"id":" padded ","name":"P"}']);
      const fromFlag = await runCli(["--file", dataFile, "add", "--id", " padded ", "--name", "P"]);

      expect(fromData.exitCode).toBe(1);
      expect(fromData.stderr).toBe(
        "Error: Record failed validation: /id id must not have leading or trailing whitespace"
      );
      expect(fromFlag.exitCode).toBe(1);
      expect(fromFlag.stderr).toContain("id must not have leading or trailing whitespace");
      expect(await fs.readFile(dataFile, "utf8")).toBe("[]\n");
    });

    it("should keep a record added while another process holds the file open", async () => {
      const server = openUserStore(dataFile, { crossProcessLock: true });

      try {
        expect(await server.list()).toEqual([]);
        expect((await runCli(["--file", dataFile, "add", "--id", "from-cli", "--name", "Cli"])).exitCode).toBe(0);
        await server.create({ id: "from-server", name: "Server" });
      } finally {
        await server.close();
      }

      const result = await runCli(["--file", dataFile, "list", "--raw"]);
      expect(JSON.parse(result.stdout)).toEqual([
        { id: "from-cli", name: "Cli" },
        { id: "from-server", name: "Server" },
      ]);
    });

    it("should exit 3 on a duplicate identifier", async () => {
      await runCli(["--file", dataFile, "add", "--id", "u1", "--name", "Ada"]);

      const result = await runCli(["--file", dataFile, "add", "--id", "u1", "--name", "Grace"]);

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe("Error: Record already exists: u1");
    });
  });

  describe("get", () => {
    it("should print one user", async () => {
      await runCli(["--file", dataFile, "init"]);
      await runCli(["--file", dataFile, "add", "--id", "u1", "--name", "Ada"]);

      const result = await runCli(["--file", dataFile, "get", "u1", "--raw"]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({ id: "u1", name: "Ada" });
    });

    it("should exit 2 for an unknown id", async () => {
      await runCli(["--file", dataFile, "init"]);

      const result = await runCli(["--file", dataFile, "get", "nope"]);

      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe("Error: User not found: nope");
    });
  });

  describe("rm", () => {
    beforeEach(async () => {
      await runCli(["--file", dataFile, "init"]);
      await runCli(["--file", dataFile, "add", "--id", "u1", "--name", "Ada"]);
    });

    it("should remove a user with --force", async () => {
      const result = await runCli(["--file", dataFile, "rm", "u1", "--force"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toContain("Removed u1");
      expect(await fs.readFile(dataFile, "utf8")).toBe("[]\n");
    });

    it("should require --force when stdin is not a terminal", async () => {
      const result = await runCli(["--file", dataFile, "rm", "u1"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("Error: Use --force to confirm removal in non-interactive mode");
      expect((await runCli(["--file", dataFile, "get", "u1"])).exitCode).toBe(0);
    });

    it("should reject an id with surrounding whitespace", async () => {
      const result = await runCli(["--file", dataFile, "rm", " u1", "--force"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("id must not have leading or trailing whitespace");
      expect((await runCli(["--file", dataFile, "get", "u1"])).exitCode).toBe(0);
    });

    it("should exit 2 for an unknown id", async () => {
      const result = await runCli(["--file", dataFile, "rm", "nope", "--force"]);

      expect(result.exitCode).toBe(2);
      expect(result.stderr).toBe("Error: Record not found: nope");
    });
  });

  describe("usage", () => {
    it("should print the version", async () => {
      const result = await runCli(["--version"]);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(VERSION);
    });

    it("should fail on an unknown command", async () => {
      const result = await runCli(["bogus"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown command 'bogus'");
    });

    it("should reject a blank --id", async () => {
      const result = await runCli(["--file", dataFile, "add", "--id", " ", "--name", "Ada"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("id must not be empty");
    });
  });
});
