import { describe, it, expect } from "vitest";
import { FakeRunner } from "../testing/fake-runner.js";
import { CommandError, PackageNotFoundError } from "./errors.js";
import {
  PackageManager,
  PackageNameSchema,
  assertPackageName,
  calculateRelevance,
  createPackageInfo,
  parseInfoOutput,
  parseSearchOutput,
  rankPackages,
} from "./pacman.js";

const SEARCH_OUTPUT = `extra/firefox 130.0-1 [installed]
    Fast, Private & Safe Web Browser
extra/firefox-developer-edition 131.0b2-1
    Firefox Developer Edition
extra/firefox-i18n-de 130.0-1 (firefox-i18n) [installed: 129.0-1]
    German language pack for Firefox
community/librewolf-firefox-shim 1.0-1
    Shim for librewolf
`;

const INFO_OUTPUT = `Repository      : extra
Name            : firefox
Version         : 130.0-1
Description     : Fast, Private & Safe Web Browser
Architecture    : x86_64
URL             : https://www.mozilla.org/firefox/
Licenses        : MPL-2.0
Groups          : None
Provides        : None
Depends On      : dbus  ffmpeg  gtk3  libpulse
                  nss  ttf-font
Optional Deps   : hunspell-en_US: Spell checking, American English
                  libnotify: Notification integration
Download Size   : 70.12 MiB
Installed Size  : 250.45 MiB
`;

describe("package names", () => {
  it("should accept names from the repositories", () => {
    for (const name of ["vlc", "lib32-glibc", "python-pyqt5", "gtk+", "r8168-dkms", "@scope", "ttf_font.x"]) {
      expect(assertPackageName(name)).toBe(name);
      expect(PackageNameSchema.safeParse(name).success).toBe(true);
    }
  });

  it("should reject anything pacman could read as an option", () => {
    for (const name of ["-dd", "--config=/tmp/evil.conf", ".hidden", "", "Firefox", "vlc gimp", "a/b"]) {
      expect(() => assertPackageName(name)).toThrow(`Invalid package name: ${name}`);
      expect(PackageNameSchema.safeParse(name).success).toBe(false);
    }
  });
});

describe("parseSearchOutput", () => {
  it("should read repository, name, version and description of each entry", () => {
    const packages = parseSearchOutput(SEARCH_OUTPUT);

    expect(packages.map((p) => p.name)).toEqual([
      "firefox",
      "firefox-developer-edition",
      "firefox-i18n-de",
      "librewolf-firefox-shim",
    ]);
    expect(packages[0]).toMatchObject({
      repo: "extra",
      version: "130.0-1",
      description: "Fast, Private & Safe Web Browser",
      installed: true,
      updateAvailable: false,
    });
    expect(packages[1].installed).toBe(false);
    expect(packages[3]).toMatchObject({ repo: "community", description: "Shim for librewolf" });
  });

  it("should flag installed packages whose local version differs", () => {
    const [, , i18n] = parseSearchOutput(SEARCH_OUTPUT);

    expect(i18n).toMatchObject({ name: "firefox-i18n-de", installed: true, updateAvailable: true });
  });

  it("should leave the description empty when no indented line follows", () => {
    const packages = parseSearchOutput("core/zlib 1:1.3.1-2\nextra/zstd 1.5.6-1\n    Zstandard\n");

    expect(packages[0]).toMatchObject({ name: "zlib", version: "1:1.3.1-2", description: "" });
    expect(packages[1].description).toBe("Zstandard");
  });

  it("should return nothing for empty output", () => {
    expect(parseSearchOutput("")).toEqual([]);
  });
});

describe("calculateRelevance", () => {
  it("should score exact, prefix and substring matches", () => {
    expect(calculateRelevance(createPackageInfo({ name: "vlc" }), "vlc")).toBe(1000);
    expect(calculateRelevance(createPackageInfo({ name: "vlc-git" }), "vlc")).toBe(800);
    expect(calculateRelevance(createPackageInfo({ name: "phonon-vlc" }), "vlc")).toBe(400);
    expect(calculateRelevance(createPackageInfo({ name: "mpv" }), "vlc")).toBe(0);
  });

  it("should ignore case and add a bonus for installed packages", () => {
    const pkg = createPackageInfo({ name: "Firefox", installed: true });

    expect(calculateRelevance(pkg, "FIREFOX")).toBe(1050);
  });
});

describe("rankPackages", () => {
  it("should order packages by relevance, highest first", () => {
    const ranked = rankPackages(parseSearchOutput(SEARCH_OUTPUT), "firefox");

    expect(ranked.map((p) => [p.name, p.relevanceScore])).toEqual([
      ["firefox", 1050],
      ["firefox-i18n-de", 850],
      ["firefox-developer-edition", 800],
      ["librewolf-firefox-shim", 400],
    ]);
  });
});

describe("parseInfoOutput", () => {
  it("should fill details from pacman -Si output", () => {
    const details = parseInfoOutput(INFO_OUTPUT, createPackageInfo({ name: "firefox" }));

    expect(details).toMatchObject({
      name: "firefox",
      repo: "extra",
      version: "130.0-1",
      description: "Fast, Private & Safe Web Browser",
      url: "https://www.mozilla.org/firefox/",
      licenses: ["MPL-2.0"],
      groups: [],
      size: "70.12 MiB",
      installedSize: "250.45 MiB",
    });
  });

  it("should join wrapped dependency lines and skip optional dependencies", () => {
    const details = parseInfoOutput(INFO_OUTPUT, createPackageInfo({ name: "firefox" }));

    expect(details.depends).toEqual(["dbus", "ffmpeg", "gtk3", "libpulse", "nss", "ttf-font"]);
  });

  it("should keep base fields the output does not mention", () => {
    const base = createPackageInfo({ name: "vlc", installed: true, description: "Media player" });
    const details = parseInfoOutput("Version : 3.0.21-1\n", base);

    expect(details).toMatchObject({ version: "3.0.21-1", installed: true, description: "Media player" });
  });
});

describe("PackageManager", () => {
  it("should not run pacman for queries shorter than two characters", async () => {
    const runner = new FakeRunner();
    const manager = new PackageManager({ runner });

    expect(await manager.search(" a ")).toEqual([]);
    expect(runner.calls).toHaveLength(0);
  });

  it("should search with a trimmed query and rank the results", async () => {
    const runner = new FakeRunner().on(["pacman", "-Ss"], { stdout: SEARCH_OUTPUT });
    const manager = new PackageManager({ runner, searchLimit: 2 });

    const packages = await manager.search("  firefox ");

    expect(runner.commandLines()).toEqual(["pacman -Ss -- firefox"]);
    expect(runner.calls[0].options.env).toEqual({ LC_ALL: "C" });
    expect(packages.map((p) => p.name)).toEqual(["firefox", "firefox-i18n-de"]);
  });

  it("should treat exit code 1 without output as no matches", async () => {
    const runner = new FakeRunner().on(["pacman", "-Ss"], { exitCode: 1 });
    const manager = new PackageManager({ runner });

    expect(await manager.search("nothing-matches")).toEqual([]);
  });

  it("should throw when pacman fails", async () => {
    const runner = new FakeRunner().on(["pacman", "-Ss"], {
      exitCode: 2,
      stderr: "error: failed to initialize alpm library",
    });
    const manager = new PackageManager({ runner });

    await expect(manager.search("firefox")).rejects.toBeInstanceOf(CommandError);
  });

  it("should load details from the sync database and check the local one", async () => {
    const runner = new FakeRunner()
      .on(["pacman", "-Si", "--", "firefox"], { stdout: INFO_OUTPUT })
      .on(["pacman", "-Q", "--", "firefox"], { stdout: "firefox 130.0-1\n" });
    const manager = new PackageManager({ runner });

    const details = await manager.details("firefox");

    expect(runner.commandLines()).toEqual(["pacman -Si -- firefox", "pacman -Q -- firefox"]);
    expect(details).toMatchObject({ name: "firefox", repo: "extra", installed: true });
  });

  it("should fall back to the local database for packages outside the repositories", async () => {
    const runner = new FakeRunner()
      .on(["pacman", "-Si"], { exitCode: 1, stderr: "error: package 'yay' was not found" })
      .on(["pacman", "-Qi", "--", "yay"], { stdout: "Name            : yay\nVersion         : 12.4.2-1\n" })
      .on(["pacman", "-Q", "--", "yay"], { stdout: "yay 12.4.2-1\n" });
    const manager = new PackageManager({ runner });

    const details = await manager.details("yay");

    expect(runner.commandLines()).toEqual(["pacman -Si -- yay", "pacman -Qi -- yay", "pacman -Q -- yay"]);
    expect(details).toMatchObject({ version: "12.4.2-1", installed: true });
  });

  it("should refuse option-like names without running pacman", async () => {
    const runner = new FakeRunner();
    const manager = new PackageManager({ runner });

    await expect(manager.details("--config=/tmp/evil.conf")).rejects.toThrow(
      "Invalid package name: --config=/tmp/evil.conf"
    );
    await expect(manager.isInstalled("-dd")).rejects.toThrow("Invalid package name: -dd");
    expect(runner.calls).toHaveLength(0);
  });

  it("should end options before the search query", async () => {
    const runner = new FakeRunner().on(["pacman", "-Ss"], { exitCode: 1 });
    const manager = new PackageManager({ runner });

    await manager.search("-dd");

    expect(runner.calls[0].args).toEqual(["-Ss", "--", "-dd"]);
  });

  it("should throw PackageNotFoundError when no database knows the package", async () => {
    const runner = new FakeRunner()
      .on(["pacman", "-Si"], { exitCode: 1 })
      .on(["pacman", "-Qi"], { exitCode: 1 });
    const manager = new PackageManager({ runner });

    await expect(manager.details("nope")).rejects.toThrow(new PackageNotFoundError("nope"));
  });
});
