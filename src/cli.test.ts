import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { inspectCommand, runCommand, sitesCommand } from "./cli.js";
import { FetchError } from "./errors.js";
import type { PageFetcher } from "./fetcher.js";

const SITE_URL = "https://ibsal.es/convocatorias-de-empleo/";

function failingFetcher(): PageFetcher {
  return {
    fetch: vi.fn(async (url: string) => {
      throw new FetchError(`HTTP 503 for ${url}`, url, 503);
    }),
  };
}

describe("cli commands", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    vi.stubEnv("LEDGER_PATH", "");
    vi.stubEnv("NOTIFICATION_EMAIL", "");
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
    configPath = path.join(dir, "config.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        ledger_path: "data/seen.json",
        delay_ms: 0,
        sites: [{ name: "IBSAL", url: SITE_URL, fetch_mode: "static", extractor: "ibsal" }],
      })
    );
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("runCommand", () => {
    it("exits 0 when a site fails and still saves the ledger and summary", async () => {
      const output = path.join(dir, "out", "summary.json");
      const code = await runCommand(
        { config: configPath, output },
        { fetcherFor: failingFetcher, report: vi.fn() }
      );

      expect(code).toBe(0);
      expect(fs.existsSync(path.join(dir, "data", "seen.json"))).toBe(true);
      const summary = JSON.parse(fs.readFileSync(output, "utf-8"));
      expect(summary.sites).toEqual([
        { site: "IBSAL", status: "failed", extracted: 0, new_postings: [], error: `HTTP 503 for ${SITE_URL}` },
      ]);
    });

    it("exits 1 on a missing config file", async () => {
      const code = await runCommand({ config: path.join(dir, "missing.json") }, { fetcherFor: failingFetcher });
      expect(code).toBe(1);
    });

    it("exits 1 on a corrupt ledger without fetching anything", async () => {
      fs.mkdirSync(path.join(dir, "data"));
      fs.writeFileSync(path.join(dir, "data", "seen.json"), "{ not json");
      const fetcherFor = vi.fn(failingFetcher);

      const code = await runCommand({ config: configPath }, { fetcherFor });

      expect(code).toBe(1);
      expect(fetcherFor).not.toHaveBeenCalled();
    });

    it("exits 1 on an unknown site name", async () => {
      const code = await runCommand({ config: configPath, site: "Nope" }, { fetcherFor: failingFetcher });
      expect(code).toBe(1);
    });
  });

  describe("sitesCommand", () => {
    it("lists each configured site", async () => {
      const write = vi.fn();
      expect(await sitesCommand({ config: configPath }, { write })).toBe(0);
      expect(write).toHaveBeenCalledWith(`IBSAL [static, active] ${SITE_URL}`);
    });
  });

  describe("inspectCommand", () => {
    it("prints the candidates of one site", async () => {
      const write = vi.fn();
      const fetcherFor = () => ({ fetch: vi.fn(async () => "<p>Sin convocatorias</p>") });

      expect(await inspectCommand("IBSAL", { config: configPath }, { fetcherFor, write })).toBe(0);
      expect(write.mock.calls.map(([line]) => line)).toEqual(["0 candidate postings on IBSAL"]);
    });

    it("exits 1 when the fetch fails", async () => {
      expect(await inspectCommand("IBSAL", { config: configPath }, { fetcherFor: failingFetcher, write: vi.fn() })).toBe(1);
    });
  });
});
