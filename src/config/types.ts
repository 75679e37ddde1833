import type { z } from 'zod';
import type {
  deliveryConfigSchema,
  gatewayConfigSchema,
  meshConfigSchema,
  reconnectionConfigSchema,
} from './schema.js';

/** Fully-resolved runtime configuration (defaults applied). */
export type MeshConfig = z.infer<typeof meshConfigSchema>;

export type DeliveryConfig = z.infer<typeof deliveryConfigSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
export type ReconnectionConfig = z.infer<typeof reconnectionConfigSchema>;
