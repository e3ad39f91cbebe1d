import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import AdmZip from "adm-zip";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { verifyDrivers } from "./verify.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { resolveConfig } from "../lib/config.js";
import { createNoopLogger } from "../lib/logger.js";
import { createServices, type Services } from "../lib/services.js";

function writeJar(path: string, entries: string[]): void {
  const zip = new AdmZip();
  for (const entry of entries) {
    zip.addFile(entry, Buffer.from("cafebabe", "hex"));
  }
  zip.writeZip(path);
}

describe("verify command", () => {
  let workDir: string;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;
  let services: Services;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "jdbc-verify-cmd-"));
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
    initContext(["node", "jdbc-drivers", "--quiet"], {});
    services = createServices({
      loadConfig: (_path, cliOptions) => ({ config: resolveConfig(cliOptions, undefined, undefined, {}), sources: [] }),
      createLogger: () => createNoopLogger(),
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  it("checks every installed engine", async () => {
    const postgresJar = join(workDir, "postgresql-42.2.18.jar");
    writeJar(postgresJar, ["org/postgresql/Driver.class"]);
    writeJar(join(workDir, "snowflake-jdbc-3.13.22.jar"), ["README.txt"]);

    const result = await verifyDrivers(services, undefined, { path: workDir });

    expect(result?.checks).toEqual([
      { dbms: "postgresql", status: "pass", driverClass: "org.postgresql.Driver", source: postgresJar },
      {
        dbms: "snowflake",
        status: "fail",
        driverClass: "net.snowflake.client.jdbc.SnowflakeDriver",
        error: "Cannot find JDBC driver class net.snowflake.client.jdbc.SnowflakeDriver",
      },
    ]);
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining("postgresql: org.postgresql.Driver"));
    expect(process.exitCode).toBe(1);
  });

  it("passes when the requested engine's class is present", async () => {
    writeJar(join(workDir, "mssql-jdbc-9.2.0.jre8.jar"), ["com/microsoft/sqlserver/jdbc/SQLServerDriver.class"]);

    const result = await verifyDrivers(services, "synapse", { path: workDir });

    expect(result?.checks.map((check) => check.status)).toEqual(["pass"]);
    expect(process.exitCode).toBeUndefined();
  });

  it("fails a requested engine that is not installed", async () => {
    writeJar(join(workDir, "postgresql-42.2.18.jar"), ["org/postgresql/Driver.class"]);

    const result = await verifyDrivers(services, "oracle", { path: workDir });

    expect(result?.checks).toEqual([
      {
        dbms: "oracle",
        status: "fail",
        driverClass: "oracle.jdbc.driver.OracleDriver",
        error: `No drivers matching pattern '^ojdbc.*\\.jar$' found in folder '${workDir}'`,
      },
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("reports an empty folder", async () => {
    const result = await verifyDrivers(services, undefined, { path: workDir });

    expect(result).toBeUndefined();
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`No drivers matching pattern '.jar' found in folder '${workDir}'`)
    );
    expect(process.exitCode).toBe(1);
  });

  it("prints a JSON result in json mode", async () => {
    initContext(["node", "jdbc-drivers", "--json"], {});
    const jar = join(workDir, "ojdbc8.jar");
    writeJar(jar, ["oracle/jdbc/driver/OracleDriver.class"]);

    await verifyDrivers(services, "oracle", { path: workDir });

    expect(JSON.parse(consoleLogSpy.mock.calls[0][0] as string)).toEqual({
      success: true,
      data: {
        path: workDir,
        checks: [{ dbms: "oracle", status: "pass", driverClass: "oracle.jdbc.driver.OracleDriver", source: jar }],
      },
    });
  });
});
