/**
 * Backend-neutral domain objects returned by every dispatcher implementation.
 * Field names are camelCase regardless of what the backend puts on the wire.
 */

export interface Group {
  label: string;
  description?: string;
  tags?: string[];
  exclusiveGroup?: string;
  members: string[];
}

export interface Component {
  id: string;
  type?: string;
  state?: string;
  flag?: string;
  enabled?: boolean;
  softwareStatus?: string;
  role?: string;
  subRole?: string;
  nid?: number;
  subtype?: string;
  netType?: string;
  arch?: string;
  class?: string;
  reservationDisabled?: boolean;
  locked?: boolean;
}

export interface ComponentFilter {
  ids?: readonly string[];
  type?: string;
  state?: string;
  flag?: string;
  role?: string;
  subRole?: string;
  enabled?: boolean;
  softwareStatus?: string;
  subtype?: string;
  arch?: string;
  class?: string;
  nids?: readonly number[];
  nidStart?: number;
  nidEnd?: number;
  partition?: string;
  group?: string;
  stateOnly?: boolean;
  flagOnly?: boolean;
  roleOnly?: boolean;
  nidOnly?: boolean;
}

export interface HardwareInventoryRecord {
  id: string;
  type?: string;
  ordinal?: number;
  status?: string;
  /** Location-specific details such as NodeLocationInfo, passed through as sent. */
  locationInfo?: Record<string, unknown>;
  populatedFru?: Record<string, unknown>;
}

export interface HardwareInventoryQuery {
  type?: string;
  children?: boolean;
  parents?: boolean;
  partition?: string;
  format?: 'Hierarchical' | 'NestNodesOnly' | 'FullyFlat';
}

export interface HardwareInventoryQueryResult {
  xname?: string;
  format?: string;
  /** Records keyed by category, e.g. "Nodes" or "Processors". */
  categories: Record<string, HardwareInventoryRecord[]>;
}

export interface RedfishEndpoint {
  id: string;
  type?: string;
  name?: string;
  hostname?: string;
  domain?: string;
  fqdn?: string;
  enabled?: boolean;
  uuid?: string;
  user?: string;
  password?: string;
  useSsdp?: boolean;
  macRequired?: boolean;
  macAddr?: string;
  ipAddress?: string;
  rediscoverOnUpdate?: boolean;
  templateId?: string;
  discoveryInfo?: {
    lastDiscoveryAttempt?: string;
    lastDiscoveryStatus?: string;
    redfishVersion?: string;
  };
}

export interface RedfishEndpointFilter {
  id?: string;
  fqdn?: string;
  type?: string;
  uuid?: string;
  macAddr?: string;
  ipAddress?: string;
  lastStatus?: string;
}

export interface IpAddressMapping {
  ipAddress: string;
  network?: string;
}

export interface EthernetInterface {
  id?: string;
  description?: string;
  macAddress: string;
  ipAddresses: IpAddressMapping[];
  lastUpdate?: string;
  componentId?: string;
  type?: string;
}

/** Fields of an ethernet interface that can be changed in place. */
export interface EthernetInterfacePatch {
  description?: string;
  ipAddresses?: IpAddressMapping[];
}

export interface EthernetInterfaceFilter {
  macAddress?: string;
  ipAddress?: string;
  network?: string;
  componentId?: string;
  type?: string;
  olderThan?: string;
  newerThan?: string;
}

export interface BootParameters {
  hosts: string[];
  macs?: string[];
  nids?: number[];
  params: string;
  kernel: string;
  initrd: string;
  cloudInit?: Record<string, unknown>;
}

export interface PowerStatus {
  xname: string;
  powerState: string;
  managementState: string;
  error?: string;
  supportedPowerTransitions: string[];
  lastUpdated?: string;
}

export type PowerOperation = 'on' | 'soft-off' | 'force-off' | 'soft-restart' | 'hard-restart';

export interface PowerTransitionTask {
  xname: string;
  status: string;
  statusDescription?: string;
  error?: string;
}

export interface PowerTransition {
  transitionId: string;
  operation: string;
  status: string;
  createdAt?: string;
  taskCounts?: Record<string, number>;
  tasks: PowerTransitionTask[];
}

export interface GroupMemberChange {
  xname: string;
  action: 'added' | 'removed';
}
