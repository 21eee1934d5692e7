import { AdapterClass, AdapterKind } from '../interfaces';
import { LibrenmsAdapter } from './librenms.adapter';
import { NetboxAdapter } from './netbox.adapter';

export { BaseToolAdapter } from './network-tool.adapter';
export { NetworkClient, NetworkClientOptions } from './network-client';
export { NetboxAdapter } from './netbox.adapter';
export { LibrenmsAdapter } from './librenms.adapter';

/** One adapter class per backend variant */
export const ADAPTER_CLASSES: Readonly<Record<AdapterKind, AdapterClass>> = {
  netbox: NetboxAdapter,
  librenms: LibrenmsAdapter,
};
