import { unsupportedEngine } from "../errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DbmsKey = "postgresql" | "redshift" | "sql server" | "oracle" | "spark" | "snowflake";

export interface DriverDescriptor {
  dbms: DbmsKey;
  /** File name of the zip under {@link DRIVERS_BASE_URL} */
  archiveFileName: string;
  version: string;
  /** Fully qualified JDBC driver class */
  driverClass: string;
  /** Regular expression that picks this engine's driver jar out of the installation folder */
  jarPattern: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DRIVERS_BASE_URL = "https://ohdsi.github.io/DatabaseConnectorJars/";

/** Name of the environment variable holding the default installation folder */
export const JAR_FOLDER_ENV = "DATABASECONNECTOR_JAR_FOLDER";

export const ALL_ENGINES = "all";

const DESCRIPTORS: readonly DriverDescriptor[] = [
  {
    dbms: "postgresql",
    archiveFileName: "postgresqlV42.2.18.zip",
    version: "42.2.18",
    driverClass: "org.postgresql.Driver",
    jarPattern: "^postgresql.*\\.jar$",
  },
  {
    dbms: "redshift",
    archiveFileName: "redShiftV2.1.0.9.zip",
    version: "2.1.0.9",
    driverClass: "com.amazon.redshift.jdbc.Driver",
    jarPattern: "^(RedshiftJDBC|redshift-jdbc).*\\.jar$",
  },
  {
    dbms: "sql server",
    archiveFileName: "sqlServerV9.2.0.zip",
    version: "9.2.0",
    driverClass: "com.microsoft.sqlserver.jdbc.SQLServerDriver",
    jarPattern: "^mssql-jdbc.*\\.jar$",
  },
  {
    dbms: "oracle",
    archiveFileName: "oracleV19.8.zip",
    version: "19.8",
    driverClass: "oracle.jdbc.driver.OracleDriver",
    jarPattern: "^ojdbc.*\\.jar$",
  },
  {
    dbms: "spark",
    archiveFileName: "SimbaSparkV2.6.21.zip",
    version: "2.6.21",
    driverClass: "com.simba.spark.jdbc.Driver",
    jarPattern: "^SparkJDBC.*\\.jar$",
  },
  {
    dbms: "snowflake",
    archiveFileName: "SnowflakeV3.13.22.zip",
    version: "3.13.22",
    driverClass: "net.snowflake.client.jdbc.SnowflakeDriver",
    jarPattern: "^snowflake-jdbc.*\\.jar$",
  },
];

const ALIASES: Readonly<Record<string, DbmsKey>> = {
  pdw: "sql server",
  synapse: "sql server",
};

/** Engines that ship inside the connectivity library and need no jar */
export const EMBEDDED_ENGINES: readonly string[] = ["sqlite", "sqlite extended"];

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

function canonical(dbms: string): string {
  return dbms.trim().toLowerCase();
}

/** Every supported engine, in download order */
export function listDescriptors(): readonly DriverDescriptor[] {
  return DESCRIPTORS;
}

export function knownEngines(): DbmsKey[] {
  return DESCRIPTORS.map((d) => d.dbms);
}

/** Values accepted wherever an engine selector is expected */
export function supportedSelectors(): string[] {
  return [...knownEngines(), ...Object.keys(ALIASES), ALL_ENGINES];
}

export function isEmbeddedEngine(dbms: string | undefined): boolean {
  return dbms !== undefined && EMBEDDED_ENGINES.includes(canonical(dbms));
}

/**
 * Map a user-supplied engine name or alias to its key.
 * Returns undefined for names with no downloadable driver.
 */
export function normalizeEngine(dbms: string): DbmsKey | undefined {
  const key = canonical(dbms);
  const aliased = ALIASES[key];
  if (aliased) return aliased;
  return DESCRIPTORS.find((d) => d.dbms === key)?.dbms;
}

/**
 * Descriptor for an engine or alias.
 * Throws UNSUPPORTED_ENGINE for anything else.
 */
export function resolveEngine(dbms: string): DriverDescriptor {
  const key = normalizeEngine(dbms);
  const descriptor = DESCRIPTORS.find((d) => d.dbms === key);
  if (!descriptor) {
    throw unsupportedEngine(dbms, supportedSelectors());
  }
  return descriptor;
}

/**
 * Expand a selector to the descriptors it covers.
 * `all` yields every engine once; anything else yields a single descriptor.
 */
export function expandSelector(selector: string): DriverDescriptor[] {
  if (canonical(selector) === ALL_ENGINES) {
    return [...DESCRIPTORS];
  }
  return [resolveEngine(selector)];
}
