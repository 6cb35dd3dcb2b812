/**
 * Source Reader Interface
 *
 * Supplies the full current snapshot of the source entity set.
 */

import type { Record } from '../types/index.js';
import type { ConnectorConfig, IConnector } from './connector.js';

export interface ISourceReader<TConfig extends ConnectorConfig = ConnectorConfig>
  extends IConnector<TConfig> {
  /**
   * Read every record of the source table or file.
   * @throws ConnectorError if the read fails
   */
  fetchAll(): Promise<Record[]>;
}
