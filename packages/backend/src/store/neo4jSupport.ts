import neo4j, { type Driver, type Integer, type Session, type SessionConfig } from "neo4j-driver";
import { appConfig } from "../config.js";

export interface Neo4jConnectionConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

export type AccessMode = "READ" | "WRITE";

export function neo4jConnectionFromEnv(): Neo4jConnectionConfig {
  return {
    uri: appConfig.NEO4J_URI,
    user: appConfig.NEO4J_USER,
    password: appConfig.NEO4J_PASSWORD,
    database: appConfig.NEO4J_DATABASE
  };
}

/**
 * Lazily-connected driver shared by the graph and vector stores that talk to the
 * same database.
 */
export class Neo4jConnection {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jConnectionConfig) {}

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4j connection is not open. Call connect() first.");
    }

    return this.driver;
  }
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

export function toText(value: unknown, fallback: string): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return fallback;
}

export function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : fallback;
  }
  if (neo4j.isInt(value)) {
    return (value as Integer).toNumber();
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

export function parseJsonRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "string" || value.length === 0) {
    return {};
  }
  try {
    return asRecord(JSON.parse(value));
  } catch {
    return {};
  }
}
