/**
 * Inventory Connectors Index
 */

export {
    BaseInventoryConnector,
    type CableDraft,
    type CableTerminationIds,
    type DeviceFilter,
    type InventoryDevice,
    type InventoryInterface,
} from './base.js';
export { NetBoxConnector } from './netbox.js';

import type { InventoryConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import type { BaseInventoryConnector } from './base.js';
import { NetBoxConnector } from './netbox.js';

/**
 * Create the inventory connector from configuration
 */
export function createInventoryConnector(config: InventoryConfig): BaseInventoryConnector {
    if (!config.verifyTls) {
        createLogger('connectors').warn({ url: config.url }, 'TLS certificate verification is disabled for the inventory API');
    }
    return new NetBoxConnector(config);
}
