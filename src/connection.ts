/**
 * Connection - owns the auth strategy, the transport and the cursors issued
 * from it.
 */

import type { AuthStrategy } from './auth/strategy.js';
import { QueryCursor } from './cursor.js';
import { ConnectionClosedError } from './errors/index.js';
import type { ConnectorLogger } from './logging/logger.js';
import type { TransportClient } from './transports/transport.js';
import type { MetadataFilters, PollOptions, TableMetadata } from './types/index.js';

export interface ConnectionOptions {
  readonly auth: AuthStrategy;
  readonly transport: TransportClient;
  readonly logger: ConnectorLogger;
  readonly pageSize: number;
  readonly poll: PollOptions;
}

export class Connection {
  private readonly cursors = new Set<QueryCursor>();
  private closePromise: Promise<void> | null = null;
  private readonly logger: ConnectorLogger;

  constructor(private readonly options: ConnectionOptions) {
    this.logger = options.logger.child({ component: 'connection' });
  }

  get closed(): boolean {
    return this.closePromise !== null;
  }

  get transportName(): string {
    return this.options.transport.name;
  }

  get auth(): AuthStrategy {
    return this.options.auth;
  }

  /**
   * Open a cursor sharing this connection's transport and token.
   *
   * @throws {@link ConnectionClosedError} after `close()`
   */
  cursor(): QueryCursor {
    if (this.closed) {
      throw new ConnectionClosedError();
    }
    const cursor = new QueryCursor(this.options.transport, {
      pageSize: this.options.pageSize,
      poll: this.options.poll,
      logger: this.options.logger,
      onClose: (closed) => this.cursors.delete(closed),
    });
    this.cursors.add(cursor);
    return cursor;
  }

  /**
   * Describe the tables this session can query.
   *
   * @throws {@link ConnectionClosedError} after `close()`
   */
  async getMetadata(filters: MetadataFilters = {}): Promise<TableMetadata[]> {
    if (this.closed) {
      throw new ConnectionClosedError();
    }
    const tables = await this.options.transport.getMetadata(filters);
    this.logger.debug('Metadata loaded', { tables: tables.length });
    return tables;
  }

  /**
   * Display names of the tables matching the filters. Tables without a
   * display name are left out.
   */
  async listTables(filters: MetadataFilters = {}): Promise<string[]> {
    const tables = await this.getMetadata(filters);
    return tables.flatMap((table) => (table.displayName === undefined ? [] : [table.displayName]));
  }

  /**
   * Close every open cursor and the transport. Safe to call more than once;
   * later calls resolve when the first one has finished.
   */
  close(): Promise<void> {
    if (this.closePromise === null) {
      this.closePromise = this.doClose();
    }
    return this.closePromise;
  }

  private async doClose(): Promise<void> {
    const open = [...this.cursors];
    for (const cursor of open) {
      cursor.close();
    }
    this.cursors.clear();
    await this.options.transport.close();
    this.logger.info('Connection closed', { cursors: open.length });
  }
}
