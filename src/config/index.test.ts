import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_API_BASE_URL, envLayer, loadConfig, mergeLayers, parseConfig } from "./index.js";

describe("mergeLayers", () => {
  it("merges nested objects and skips undefined values", () => {
    expect(
      mergeLayers({ retry: { maxAttempts: 3, multiplier: 2 }, logLevel: "warn" }, { retry: { maxAttempts: 5 }, logLevel: undefined }),
    ).toEqual({ retry: { maxAttempts: 5, multiplier: 2 }, logLevel: "warn" });
  });

  it("lets null override a value", () => {
    expect(mergeLayers({ launch: { region: "us-east-1" } }, { launch: { region: null } })).toEqual({
      launch: { region: null },
    });
  });
});

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig();

    expect(config.logLevel).toBe("info");
    expect(config.api.baseUrl).toBe(DEFAULT_API_BASE_URL);
    expect(config.api.apiKey).toBe("");
    expect(config.ssh.username).toBe("ubuntu");
    expect(config.retry).toEqual({
      maxAttempts: 20,
      initialDelayMs: 5_000,
      maxDelayMs: 60_000,
      multiplier: 1.5,
      jitterRatio: 0,
    });
    expect(config.wait).toEqual({ intervalMs: 5_000, timeoutMs: 600_000 });
    expect(config.launch).toEqual({
      region: null,
      instanceType: null,
      sshKeyName: null,
      filesystemName: null,
      imageId: null,
      name: null,
    });
  });

  it("applies layers in order, later ones winning", () => {
    const config = parseConfig(
      { launch: { region: "us-east-1", instanceType: "gpu_1x_a10" } },
      { launch: { region: "us-west-1" } },
      { launch: { instanceType: "gpu_1x_a100" } },
    );

    expect(config.launch.region).toBe("us-west-1");
    expect(config.launch.instanceType).toBe("gpu_1x_a100");
  });

  it("coerces numeric strings from the environment", () => {
    const config = parseConfig(envLayer({ DEVBOX_RETRY_MAX_ATTEMPTS: "3", DEVBOX_WAIT_TIMEOUT_MS: "90000" }));

    expect(config.retry.maxAttempts).toBe(3);
    expect(config.wait.timeoutMs).toBe(90_000);
  });

  it("treats blank names as unset", () => {
    expect(parseConfig({ launch: { filesystemName: "  " } }).launch.filesystemName).toBeNull();
  });

  it("rejects delays longer than a timer can hold", () => {
    expect(() => parseConfig({ retry: { maxDelayMs: 3_000_000_000 } })).toThrow(
      "Invalid configuration: retry.maxDelayMs: Number must be less than or equal to 2147483647",
    );
    expect(() => parseConfig({ wait: { intervalMs: 3_000_000_000 } })).toThrow(
      "wait.intervalMs: Number must be less than or equal to 2147483647",
    );
  });

  it("rejects an initial delay above the cap", () => {
    expect(() => parseConfig({ retry: { initialDelayMs: 90_000, maxDelayMs: 60_000 } })).toThrow(
      "Invalid configuration: retry.initialDelayMs: initialDelayMs must not exceed maxDelayMs",
    );
  });

  it("lists every invalid path", () => {
    let caught: unknown;
    try {
      parseConfig({ logLevel: "verbose", retry: { maxAttempts: -1 } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof Error ? caught.message : "").toMatch(/^Invalid configuration: logLevel: .*; retry\.maxAttempts: /);
  });
});

describe("envLayer", () => {
  it("treats exported but empty variables as unset", () => {
    const config = parseConfig(
      envLayer({ DEVBOX_RETRY_MAX_ATTEMPTS: "", LAMBDA_API_TIMEOUT_MS: " ", DEVBOX_POLL_INTERVAL_MS: "" }),
    );

    expect(config.retry.maxAttempts).toBe(20);
    expect(config.api.timeoutMs).toBe(120_000);
    expect(config.wait.intervalMs).toBe(5_000);
  });

  it("does not let an empty variable hide the config file value", () => {
    const config = parseConfig({ launch: { region: "us-east-1" } }, envLayer({ DEVBOX_REGION: "" }));

    expect(config.launch.region).toBe("us-east-1");
  });

  it("accepts LOG_LEVEL in any case", () => {
    expect(parseConfig(envLayer({ LOG_LEVEL: "DEBUG" })).logLevel).toBe("debug");
  });

  it("maps the API key and launch defaults", () => {
    const layer = envLayer({ LAMBDA_API_KEY: "test-secret", DEVBOX_REGION: "us-east-1", DEVBOX_SSH_KEY: "laptop" });
    const config = parseConfig(layer);

    expect(config.api.apiKey).toBe("test-secret");
    expect(config.launch.region).toBe("us-east-1");
    expect(config.launch.sshKeyName).toBe("laptop");
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "devbox-load-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("layers file, environment and flags", async () => {
    const configPath = path.join(tmpDir, "devbox.yaml");
    fs.writeFileSync(configPath, "launch:\n  region: us-east-1\n  sshKeyName: laptop\nretry:\n  maxAttempts: 5\n");

    const config = await loadConfig({
      configPath,
      env: { DEVBOX_REGION: "us-west-1", DEVBOX_RETRY_MAX_ATTEMPTS: "7" },
      overrides: { retry: { maxAttempts: "2" } },
    });

    expect(config.launch.region).toBe("us-west-1");
    expect(config.launch.sshKeyName).toBe("laptop");
    expect(config.retry.maxAttempts).toBe(2);
  });

  it("fails when an explicit file is missing", async () => {
    await expect(loadConfig({ configPath: path.join(tmpDir, "nope.yaml"), env: {} })).rejects.toThrow(
      "Cannot read config file",
    );
  });
});
