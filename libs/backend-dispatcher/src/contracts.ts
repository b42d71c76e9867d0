import type { NodeSelector } from '@libs/hostlist';
import type { BatchResult } from './results';
import type {
  BootParameters,
  Component,
  ComponentFilter,
  EthernetInterface,
  EthernetInterfaceFilter,
  EthernetInterfacePatch,
  Group,
  GroupMemberChange,
  HardwareInventoryQuery,
  HardwareInventoryQueryResult,
  HardwareInventoryRecord,
  IpAddressMapping,
  PowerStatus,
  PowerTransitionTask,
  RedfishEndpoint,
  RedfishEndpointFilter,
} from './types';

export interface OperationOptions {
  /** Stops awaiting the operation; requests already sent finish unobserved. */
  signal?: AbortSignal;
}

/** Outcome of moving nodes from one group to another. */
export interface GroupMigration {
  /** Per-host result of the move. */
  moved: BatchResult<string>;
  /** Target group members once the hosts that moved are counted, sorted. */
  targetMembers: string[];
  /** Parent group members that remain, sorted. */
  parentMembers: string[];
}

export interface GroupOperations {
  getAllGroups(options?: OperationOptions): Promise<Group[]>;
  /** Groups the caller may act on. */
  getGroupsAvailable(options?: OperationOptions): Promise<Group[]>;
  getGroupNamesAvailable(options?: OperationOptions): Promise<string[]>;
  getGroup(label: string, options?: OperationOptions): Promise<Group>;
  /** All groups, or only those named in `labels`. */
  getGroups(labels?: readonly string[], options?: OperationOptions): Promise<Group[]>;
  addGroup(group: Group, options?: OperationOptions): Promise<Group>;
  deleteGroup(label: string, options?: OperationOptions): Promise<void>;
  /** Union of the members of the named groups, without duplicates. */
  getGroupMembers(labels: readonly string[], options?: OperationOptions): Promise<string[]>;
  getGroupMap(labels: readonly string[], options?: OperationOptions): Promise<Record<string, string[]>>;
  /** Groups containing any of `xnames`, each mapped to the matching members. */
  getGroupMapByMembers(xnames: readonly string[], options?: OperationOptions): Promise<Record<string, string[]>>;
  addMembersToGroup(label: string, selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<string>>;
  deleteMemberFromGroup(label: string, xname: string, options?: OperationOptions): Promise<void>;
  /**
   * Removes `membersToRemove` from the group and adds `membersToAdd`, one
   * request per host. A host may not appear in both lists.
   */
  updateGroupMembers(
    label: string,
    membersToRemove: readonly string[],
    membersToAdd: readonly string[],
    options?: OperationOptions,
  ): Promise<BatchResult<GroupMemberChange>>;
  /**
   * Moves the selected hosts from `parentLabel` into `targetLabel`. Every
   * host must currently belong to the parent group.
   */
  migrateGroupMembers(
    targetLabel: string,
    parentLabel: string,
    selector: NodeSelector,
    options?: OperationOptions,
  ): Promise<GroupMigration>;
}

export interface ComponentOperations {
  getAllNodes(nidOnly?: boolean, options?: OperationOptions): Promise<Component[]>;
  /** Nodes the caller may see, with their NIDs. */
  getNodeMetadataAvailable(options?: OperationOptions): Promise<Component[]>;
  getComponents(filter: ComponentFilter, options?: OperationOptions): Promise<Component[]>;
  getNodeInventory(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<Component>>;
  postNodes(components: readonly Component[], force: boolean, options?: OperationOptions): Promise<void>;
  deleteNode(xname: string, options?: OperationOptions): Promise<void>;
}

export interface HardwareInventoryOperations {
  getHardwareInventory(
    selector: NodeSelector,
    options?: OperationOptions,
  ): Promise<BatchResult<HardwareInventoryRecord>>;
  queryHardwareInventory(
    xname: string,
    query?: HardwareInventoryQuery,
    options?: OperationOptions,
  ): Promise<HardwareInventoryQueryResult>;
  postHardwareInventory(records: readonly HardwareInventoryRecord[], options?: OperationOptions): Promise<void>;
}

export interface RedfishEndpointOperations {
  getRedfishEndpoints(filter?: RedfishEndpointFilter, options?: OperationOptions): Promise<RedfishEndpoint[]>;
  addRedfishEndpoint(endpoint: RedfishEndpoint, options?: OperationOptions): Promise<void>;
  updateRedfishEndpoint(endpoint: RedfishEndpoint, options?: OperationOptions): Promise<void>;
  deleteRedfishEndpoint(id: string, options?: OperationOptions): Promise<void>;
}

export interface EthernetInterfaceOperations {
  getEthernetInterfaces(filter?: EthernetInterfaceFilter, options?: OperationOptions): Promise<EthernetInterface[]>;
  getEthernetInterface(id: string, options?: OperationOptions): Promise<EthernetInterface>;
  addEthernetInterface(ethernetInterface: EthernetInterface, options?: OperationOptions): Promise<void>;
  updateEthernetInterface(id: string, patch: EthernetInterfacePatch, options?: OperationOptions): Promise<void>;
  deleteEthernetInterface(id: string, options?: OperationOptions): Promise<void>;
  deleteAllEthernetInterfaces(options?: OperationOptions): Promise<void>;
  getIpAddresses(id: string, options?: OperationOptions): Promise<IpAddressMapping[]>;
  addIpAddress(id: string, mapping: IpAddressMapping, options?: OperationOptions): Promise<void>;
  deleteIpAddress(id: string, ipAddress: string, options?: OperationOptions): Promise<void>;
}

export interface BootParameterOperations {
  getAllBootParameters(options?: OperationOptions): Promise<BootParameters[]>;
  getBootParameters(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<BootParameters>>;
  addBootParameters(bootParameters: BootParameters, options?: OperationOptions): Promise<void>;
  updateBootParameters(bootParameters: BootParameters, options?: OperationOptions): Promise<void>;
  deleteBootParameters(bootParameters: BootParameters, options?: OperationOptions): Promise<void>;
}

export interface PowerOperations {
  getPowerStatus(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<PowerStatus>>;
  powerOn(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<PowerTransitionTask>>;
  /** `force` selects a hard power off instead of a graceful shutdown. */
  powerOff(selector: NodeSelector, force: boolean, options?: OperationOptions): Promise<BatchResult<PowerTransitionTask>>;
  powerReset(
    selector: NodeSelector,
    force: boolean,
    options?: OperationOptions,
  ): Promise<BatchResult<PowerTransitionTask>>;
}

export interface NodeResolutionOperations {
  /**
   * Translates node names into xnames. With `isRegex` the input is a
   * comma-separated list of patterns matched against zero-padded names
   * (`nid000001`); otherwise it is a hostlist of `nid` names.
   */
  nidToXname(input: string, isRegex: boolean, options?: OperationOptions): Promise<string[]>;
}

/**
 * The capability set every cluster-management backend implements. Callers
 * program against this interface and never build backend requests themselves.
 */
export interface BackendDispatcher
  extends GroupOperations,
    ComponentOperations,
    HardwareInventoryOperations,
    RedfishEndpointOperations,
    EthernetInterfaceOperations,
    BootParameterOperations,
    PowerOperations,
    NodeResolutionOperations {
  readonly backendName: string;
}
