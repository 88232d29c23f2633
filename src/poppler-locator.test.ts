import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  findPopplerPath,
  parseInstallerOutput,
  resolvePopplerPath,
  runPopplerInstaller,
  ToolchainLocation,
} from "./poppler-locator";

let baseDir: string;

function makeDir(...segments: string[]): string {
  const dir = join(baseDir, ...segments);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeScript(name: string, body: string): string {
  const scriptPath = join(baseDir, name);
  writeFileSync(scriptPath, `#!/bin/sh\n${body}\n`);
  chmodSync(scriptPath, 0o755);
  return scriptPath;
}

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), "locator-test-"));
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe("findPopplerPath", () => {
  it("returns the highest priority candidate that exists", () => {
    makeDir("poppler-23.11.0", "Library", "bin");
    const expected = makeDir("poppler", "bin");

    expect(findPopplerPath(baseDir)).toBe(expected);
  });

  it("prefers the versioned bundle when it is present", () => {
    makeDir("poppler", "bin");
    const expected = makeDir("poppler", "poppler-23.11.0", "Library", "bin");

    expect(findPopplerPath(baseDir)).toBe(expected);
  });

  it("returns undefined when no candidate exists", () => {
    expect(findPopplerPath(baseDir)).toBeUndefined();
  });
});

describe("parseInstallerOutput", () => {
  it("extracts the installed path from the marker line", () => {
    const stdout =
      "Downloading poppler...\nPoppler installed at: /opt/poppler/bin  \nDone\n";

    expect(parseInstallerOutput(stdout)).toBe("/opt/poppler/bin");
  });

  it("returns undefined without a marker", () => {
    expect(parseInstallerOutput("nothing to see\n")).toBeUndefined();
    expect(parseInstallerOutput("Poppler installed at:   \n")).toBeUndefined();
  });
});

describe("runPopplerInstaller", () => {
  it("returns the path printed by a successful installer", () => {
    const script = writeScript(
      "install.sh",
      'echo "fetching"\necho "Poppler installed at: /opt/poppler/bin"'
    );

    expect(runPopplerInstaller(script)).toBe("/opt/poppler/bin");
  });

  it("returns undefined when the installer fails", () => {
    const script = writeScript(
      "install.sh",
      'echo "Poppler installed at: /opt/poppler/bin"\necho "no network" >&2\nexit 1'
    );

    expect(runPopplerInstaller(script)).toBeUndefined();
  });

  it("returns undefined when the installer prints no marker", () => {
    const script = writeScript("install.sh", 'echo "all good"');

    expect(runPopplerInstaller(script)).toBeUndefined();
  });

  it("returns undefined when the script does not exist", () => {
    expect(runPopplerInstaller(join(baseDir, "missing.sh"))).toBeUndefined();
  });
});

describe("resolvePopplerPath", () => {
  it("uses the override without probing", () => {
    makeDir("poppler", "bin");

    expect(
      resolvePopplerPath({
        baseDir,
        installScript: join(baseDir, "missing.sh"),
        override: "/custom/poppler",
      })
    ).toBe("/custom/poppler");
  });

  it("prefers a candidate directory over the installer", () => {
    const expected = makeDir("poppler", "Library", "bin");
    const script = writeScript(
      "install.sh",
      'echo "Poppler installed at: /opt/poppler/bin"'
    );

    expect(resolvePopplerPath({ baseDir, installScript: script })).toBe(
      expected
    );
  });

  it("falls back to the installer when no candidate exists", () => {
    const script = writeScript(
      "install.sh",
      'echo "Poppler installed at: /opt/poppler/bin"'
    );

    expect(resolvePopplerPath({ baseDir, installScript: script })).toBe(
      "/opt/poppler/bin"
    );
  });

  it("leaves the location unset when everything fails", () => {
    expect(
      resolvePopplerPath({ baseDir, installScript: join(baseDir, "none.sh") })
    ).toBeUndefined();
  });
});

describe("ToolchainLocation", () => {
  it("keeps a cached path that still exists", () => {
    const dir = makeDir("elsewhere");
    const location = new ToolchainLocation(baseDir, dir);

    expect(location.current()).toBe(dir);
    expect(location.get()).toBe(dir);
  });

  it("discards a cached path that no longer exists", () => {
    const location = new ToolchainLocation(baseDir, join(baseDir, "gone"));

    expect(location.current()).toBeUndefined();
    expect(location.get()).toBeUndefined();
  });

  it("re-probes only the two likeliest candidates when empty", () => {
    makeDir("poppler", "bin");
    const location = new ToolchainLocation(baseDir);

    expect(location.current()).toBeUndefined();

    const expected = makeDir("poppler", "Library", "bin");
    expect(location.current()).toBe(expected);
    expect(location.get()).toBe(expected);
  });
});
