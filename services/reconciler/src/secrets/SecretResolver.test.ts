import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { MissingSecretError } from "../errors.js";
import { SecretResolver, describeSecretRef } from "./SecretResolver.js";

describe("SecretResolver", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), "secret-resolver-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("resolves env pointers", () => {
    const resolver = new SecretResolver({ DB_PASSWORD: "test-secret" });

    expect(resolver.resolve({ source: "env", id: "DB_PASSWORD" })).toBe("test-secret");
  });

  it("prefers the _FILE indirection for env pointers", () => {
    const secretPath = path.join(tempDir, "password");
    writeFileSync(secretPath, " from-file \n");
    const resolver = new SecretResolver({ DB_PASSWORD: "from-env", DB_PASSWORD_FILE: secretPath });

    expect(resolver.resolve({ source: "env", id: "DB_PASSWORD" })).toBe("from-file");
  });

  it("resolves file pointers", () => {
    const secretPath = path.join(tempDir, "cert.pem");
    writeFileSync(secretPath, "test-certificate\n");
    const resolver = new SecretResolver({});

    expect(resolver.resolve({ source: "file", path: secretPath })).toBe("test-certificate");
  });

  it("throws MissingSecretError when the pointer cannot be resolved", () => {
    const resolver = new SecretResolver({ EMPTY: "" });

    expect(() => resolver.resolve({ source: "env", id: "EMPTY" })).toThrowError(MissingSecretError);
    expect(() => resolver.resolve({ source: "file", path: path.join(tempDir, "absent") })).toThrowError(
      `Secret file:${path.join(tempDir, "absent")} is not set`,
    );
  });

  it("builds payloads with secrets merged into the desired fields", () => {
    const resolver = new SecretResolver({ DB_PASSWORD: "test-secret" });

    const payload = resolver.buildPayload(
      { name: "warehouse", host: "db.internal" },
      { password: { source: "env", id: "DB_PASSWORD" } },
    );

    expect(payload).toEqual({ name: "warehouse", host: "db.internal", password: "test-secret" });
  });

  it("describes pointers without their values", () => {
    expect(describeSecretRef({ source: "env", id: "DB_PASSWORD" })).toBe("env:DB_PASSWORD");
    expect(describeSecretRef({ source: "file", path: "/run/secrets/db" })).toBe("file:/run/secrets/db");
  });
});
