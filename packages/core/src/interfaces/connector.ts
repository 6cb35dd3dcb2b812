/**
 * Connector life cycle
 *
 * Source readers and history stores (file or database) share this shape.
 */

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (csv, json, postgresql, mysql, sqlite) */
  type: string;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface IConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  /** Connector configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Initialize the connection to the data source
   * @throws ConnectorError if connection fails
   */
  connect(): Promise<void>;

  /**
   * Close the connection and clean up resources
   */
  disconnect(): Promise<void>;

  /**
   * Test the connection without performing operations
   * @returns true if connection is healthy
   */
  testConnection(): Promise<boolean>;
}
