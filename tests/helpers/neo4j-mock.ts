/**
 * Mock Neo4j driver for unit testing
 *
 * In-process stand-ins for Driver, Session, managed transactions and results, enough
 * to drive Neo4jGraphClient without a Neo4j instance.
 */

/* eslint-disable @typescript-eslint/require-await */

import type { Driver, SessionConfig } from "neo4j-driver";
import type { DriverFactory, DriverSettings } from "../../src/graph/Neo4jClient.js";

/**
 * Counter values a mock write reports
 */
export interface MockUpdates {
  nodesCreated?: number;
  relationshipsCreated?: number;
  propertiesSet?: number;
}

/**
 * Mock Neo4j Record implementation
 */
export class MockRecord {
  private data: Map<string, unknown>;
  keys: string[];

  constructor(keys: string[], values: unknown[]) {
    this.keys = keys;
    this.data = new Map();
    keys.forEach((key, index) => {
      this.data.set(key, values[index]);
    });
  }

  get(key: string): unknown {
    return this.data.get(key);
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.data);
  }
}

/**
 * A query the mock session received
 */
export interface RecordedRun {
  query: string;
  parameters: Record<string, unknown>;
  mode: "read" | "write";
}

/**
 * Mock result shaped like neo4j-driver's QueryResult
 */
export function createMockResult(
  records: MockRecord[] = [],
  updates: MockUpdates = {}
): { records: MockRecord[]; summary: { counters: { updates: () => Record<string, number> } } } {
  return {
    records,
    summary: {
      counters: {
        updates: () => ({
          nodesCreated: updates.nodesCreated ?? 0,
          nodesDeleted: 0,
          relationshipsCreated: updates.relationshipsCreated ?? 0,
          relationshipsDeleted: 0,
          propertiesSet: updates.propertiesSet ?? 0,
          labelsAdded: 0,
          labelsRemoved: 0,
          indexesAdded: 0,
          indexesRemoved: 0,
          constraintsAdded: 0,
          constraintsRemoved: 0,
        }),
      },
    },
  };
}

type MockTransaction = {
  run: (
    query: string,
    parameters?: Record<string, unknown>
  ) => Promise<ReturnType<typeof createMockResult>>;
};

/**
 * Mock Neo4j Session implementation
 *
 * Each `run` first consumes a queued failure, if any, then answers with the records
 * of the first registered pattern the query contains and the configured updates.
 */
export class MockSession {
  private mockResults: Map<string, MockRecord[]> = new Map();
  private failures: Error[] = [];
  public closeCount: number = 0;
  public closeError?: Error;
  public updates: MockUpdates | ((parameters: Record<string, unknown>) => MockUpdates) = {};
  public readonly runs: RecordedRun[] = [];

  constructor(public readonly config?: SessionConfig) {}

  /**
   * Set the records returned for queries containing `cypherPattern`
   */
  setQueryResult(cypherPattern: string, records: MockRecord[]): void {
    this.mockResults.set(cypherPattern, records);
  }

  /**
   * Fail the next runs, one queued error per run
   */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async executeRead<T>(work: (tx: MockTransaction) => Promise<T>): Promise<T> {
    return work({ run: (query, parameters) => this.run(query, parameters, "read") });
  }

  async executeWrite<T>(work: (tx: MockTransaction) => Promise<T>): Promise<T> {
    return work({ run: (query, parameters) => this.run(query, parameters, "write") });
  }

  /**
   * Sessions are shared, so closing only counts
   */
  async close(): Promise<void> {
    this.closeCount++;
    if (this.closeError) {
      throw this.closeError;
    }
  }

  private async run(
    query: string,
    parameters: Record<string, unknown> = {},
    mode: "read" | "write"
  ): Promise<ReturnType<typeof createMockResult>> {
    this.runs.push({ query, parameters, mode });

    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }

    let records: MockRecord[] = [];
    for (const [pattern, result] of this.mockResults.entries()) {
      if (query.includes(pattern)) {
        records = result;
        break;
      }
    }

    const updates = typeof this.updates === "function" ? this.updates(parameters) : this.updates;
    return createMockResult(records, updates);
  }
}

/**
 * Mock Neo4j Driver implementation
 *
 * Hands out one shared session so tests can configure it before the client asks.
 */
export class MockDriver {
  private connectFailures: Error[] = [];
  private healthy: boolean = true;
  private closed: boolean = false;
  private closeError?: Error;
  public readonly session: (config?: SessionConfig) => MockSession;
  public readonly sessionConfigs: Array<SessionConfig | undefined> = [];
  public verifyCount: number = 0;

  constructor(public readonly current: MockSession = new MockSession()) {
    this.session = (config?: SessionConfig): MockSession => {
      if (this.closed) {
        throw new Error("Driver is closed");
      }
      this.sessionConfigs.push(config);
      return this.current;
    };
  }

  /**
   * Fail the next connectivity checks, one queued error per check
   */
  failConnect(...errors: Error[]): void {
    this.connectFailures.push(...errors);
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  async verifyConnectivity(): Promise<void> {
    this.verifyCount++;
    const failure = this.connectFailures.shift();
    if (failure) {
      throw failure;
    }
  }

  async getServerInfo(): Promise<{ address: string; agent: string; protocolVersion: number }> {
    if (!this.healthy) {
      throw new Error("Server not responding");
    }
    return { address: "localhost:7687", agent: "Neo4j/5.20.0", protocolVersion: 5.4 };
  }

  /**
   * Make `close` reject with `error` after marking the driver closed
   */
  failClose(error: Error): void {
    this.closeError = error;
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.closeError) {
      throw this.closeError;
    }
  }

  isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Driver factory handing `mock` to the client, recording what it was called with
 */
export function mockDriverFactory(mock: MockDriver): DriverFactory & {
  calls: Array<{ uri: string; username: string; settings: DriverSettings }>;
} {
  const calls: Array<{ uri: string; username: string; settings: DriverSettings }> = [];
  const factory = (
    uri: string,
    username: string,
    _password: string,
    settings: DriverSettings
  ): Driver => {
    calls.push({ uri, username, settings });
    // The mock implements the part of Driver the client uses
    return mock as unknown as Driver;
  };
  return Object.assign(factory, { calls });
}
