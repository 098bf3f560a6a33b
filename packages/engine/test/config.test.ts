import assert from "node:assert/strict";
import path from "node:path";
import { test } from "node:test";
import { loadConfig, parseLogLevel, tokenHint } from "../src/config";
import { ValidationError } from "../src/errors";
import { captureLogger } from "./support/fixture-server";

test("environment overrides are trimmed and normalized", () => {
  const config = loadConfig(
    {
      GITHUB_TOKEN: " ",
      GH_TOKEN: "test-secret",
      TAPWRIGHT_API_URL: "http://127.0.0.1:9/api/",
      TAPWRIGHT_LOG_LEVEL: "DEBUG",
      TAPWRIGHT_TAP_ROOT: "tap",
      TAPWRIGHT_VALIDATOR: "/opt/brew/bin/brew",
      TAPWRIGHT_TAP_NAME: "acme/tools"
    },
    "/work"
  );
  assert.deepEqual(config, {
    githubToken: "test-secret",
    apiUrl: "http://127.0.0.1:9/api",
    logLevel: "debug",
    tapRoot: path.resolve("/work", "tap"),
    validatorCommand: "/opt/brew/bin/brew",
    tapName: "acme/tools"
  });
});

test("defaults apply to an empty environment", () => {
  assert.deepEqual(loadConfig({}, "/work"), {
    apiUrl: "https://api.github.com",
    logLevel: "info",
    tapRoot: path.resolve("/work"),
    validatorCommand: "brew"
  });
});

test("unknown log levels are rejected", () => {
  assert.throws(() => parseLogLevel("verbose"), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.equal(error.message, 'Invalid log level "verbose" (expected one of debug, info, warn, error)');
    return true;
  });
  assert.equal(parseLogLevel(undefined), "info");
});

test("token hint follows the environment", () => {
  assert.match(tokenHint({ GITHUB_ACTIONS: "true" }), /^add `env: GITHUB_TOKEN/);
  assert.match(tokenHint({ CODESPACES: "true" }), /^Codespaces provides GITHUB_TOKEN/);
  assert.match(tokenHint({}), /^export GITHUB_TOKEN=/);
});

test("child loggers join scopes and drop lower levels", () => {
  const { logger, lines } = captureLogger("info");
  const child = logger.child("generate").child("archive");
  child.debug("hidden");
  child.info("Archive introspected", { members: 3 });
  logger.error("plain");
  assert.deepEqual(lines, [
    { level: "info", line: '[generate:archive] Archive introspected {"members":3}' },
    { level: "error", line: "plain" }
  ]);
});
