import { setTimeout as sleep } from 'timers/promises';
import type { ZodTypeAny, output } from 'zod';
import {
  ConsoleLogger,
  DispatchError,
  TransportBridge,
  buildRequest,
  createFetchTransport,
  encodeSegment,
  invalidArgument,
  mapEmptyResponse,
  mapJsonResponse,
  type Logger,
  type QueryParams,
  type RequestDescriptor,
} from '@libs/dispatch-http-core';
import { expandHostlist, resolveSelector, type NodeSelector } from '@libs/hostlist';
import { outcomesOf } from '@libs/backend-dispatcher';
import type {
  BackendDispatcher,
  BatchResult,
  BootParameters,
  Component,
  ComponentFilter,
  EthernetInterface,
  EthernetInterfaceFilter,
  EthernetInterfacePatch,
  Group,
  GroupMemberChange,
  GroupMigration,
  HardwareInventoryQuery,
  HardwareInventoryQueryResult,
  HardwareInventoryRecord,
  IpAddressMapping,
  OperationOptions,
  PowerOperation,
  PowerStatus,
  PowerTransition,
  PowerTransitionTask,
  RedfishEndpoint,
  RedfishEndpointFilter,
} from '@libs/backend-dispatcher';
import { resolveOchamiSettings, type OchamiConfig, type OchamiSettings } from './config';
import { dispatchInBatches, dispatchPerHost, type FanOutContext, type HostValues } from './fanOut';
import {
  bootParametersListSchema,
  componentListSchema,
  componentSchema,
  ethernetInterfaceListSchema,
  ethernetInterfaceSchema,
  groupListSchema,
  groupSchema,
  hardwareQuerySchema,
  hardwareRecordSchema,
  ipAddressListSchema,
  powerStatusListSchema,
  powerTransitionSchema,
  redfishEndpointListSchema,
  toBootParametersWire,
  toComponentWire,
  toEthernetInterfacePatchWire,
  toEthernetInterfaceWire,
  toGroupWire,
  toHardwareRecordWire,
  toIpAddressWire,
  toRedfishEndpointWire,
  transitionCreatedSchema,
} from './schemas';

const TERMINAL_TRANSITION_STATES = new Set(['completed', 'aborted', 'abort-signaled']);
const SUCCEEDED_TASK_STATE = 'succeeded';

/**
 * OCHAMI backend for the dispatcher capability set.
 *
 * Talks to SMD (groups, components, inventory), BSS (boot parameters) and
 * PCS (power). Operations over a node selector return a BatchResult with one
 * outcome per expanded host, in expansion order.
 */
export class OchamiDispatcher implements BackendDispatcher {
  readonly backendName = 'ochami';

  private readonly settings: OchamiSettings;
  private readonly bridge: TransportBridge;
  private readonly logger: Logger;

  constructor(config: OchamiConfig) {
    this.settings = resolveOchamiSettings(config);
    this.logger = config.logger ?? new ConsoleLogger();
    const transport =
      config.transport ??
      createFetchTransport({ tls: this.settings.endpoint.tls, proxyUrl: this.settings.endpoint.proxyUrl });
    this.bridge = new TransportBridge({
      transport,
      timeoutMs: this.settings.timeoutMs,
      maxInFlight: this.settings.maxInFlight,
      logger: this.logger,
    });
  }

  // ==========================================================================
  // Groups
  // ==========================================================================

  async getAllGroups(options?: OperationOptions): Promise<Group[]> {
    return this.getJson(
      { operation: 'getAllGroups', method: 'GET', resource: 'group' },
      groupListSchema,
      options,
    );
  }

  // OCHAMI has no per-user group authorization, so every group is available.
  async getGroupsAvailable(options?: OperationOptions): Promise<Group[]> {
    return this.getAllGroups(options);
  }

  async getGroupNamesAvailable(options?: OperationOptions): Promise<string[]> {
    const groups = await this.getGroupsAvailable(options);
    return groups.map((group) => group.label);
  }

  async getGroup(label: string, options?: OperationOptions): Promise<Group> {
    return this.getJson(
      { operation: 'getGroup', method: 'GET', resource: 'group', id: label },
      groupSchema,
      options,
    );
  }

  async getGroups(labels?: readonly string[], options?: OperationOptions): Promise<Group[]> {
    const query = labels === undefined ? undefined : { group: requireLabels(labels, 'getGroups') };
    return this.getJson(
      { operation: 'getGroups', method: 'GET', resource: 'group', query },
      groupListSchema,
      options,
    );
  }

  async addGroup(group: Group, options?: OperationOptions): Promise<Group> {
    encodeSegment(group.label, 'label', 'addGroup');
    await this.send(
      { operation: 'addGroup', method: 'POST', resource: 'group', body: toGroupWire(group) },
      options,
    );
    this.logger.info('ochami.group.created', { label: group.label, members: group.members.length });
    return group;
  }

  async deleteGroup(label: string, options?: OperationOptions): Promise<void> {
    return this.send({ operation: 'deleteGroup', method: 'DELETE', resource: 'group', id: label }, options);
  }

  async getGroupMembers(labels: readonly string[], options?: OperationOptions): Promise<string[]> {
    const groups = await this.getGroups(requireLabels(labels, 'getGroupMembers'), options);
    const members = new Set<string>();
    for (const group of groups) {
      for (const member of group.members) {
        members.add(member);
      }
    }
    return [...members];
  }

  async getGroupMap(labels: readonly string[], options?: OperationOptions): Promise<Record<string, string[]>> {
    const groups = await this.getGroups(requireLabels(labels, 'getGroupMap'), options);
    const map: Record<string, string[]> = {};
    for (const group of groups) {
      map[group.label] = group.members;
    }
    return map;
  }

  async getGroupMapByMembers(
    xnames: readonly string[],
    options?: OperationOptions,
  ): Promise<Record<string, string[]>> {
    const wanted = new Set(resolveSelector(xnames));
    const groups = await this.getAllGroups(options);
    const map: Record<string, string[]> = {};
    for (const group of groups) {
      const matched = group.members.filter((member) => wanted.has(member));
      if (matched.length > 0) {
        map[group.label] = matched;
      }
    }
    return map;
  }

  async addMembersToGroup(label: string, selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<string>> {
    const operation = 'addMembersToGroup';
    encodeSegment(label, 'label', operation);
    const hosts = this.resolveXnames(selector, operation);
    return dispatchPerHost(hosts, this.fanOutContext(operation, options), async (host) => {
      await this.send(
        { operation, method: 'POST', resource: 'group', id: label, subresource: 'members', body: { id: host } },
        options,
      );
      return host;
    });
  }

  async deleteMemberFromGroup(label: string, xname: string, options?: OperationOptions): Promise<void> {
    return this.send(
      {
        operation: 'deleteMemberFromGroup',
        method: 'DELETE',
        resource: 'group',
        id: label,
        subresource: 'members',
        subId: xname,
      },
      options,
    );
  }

  async updateGroupMembers(
    label: string,
    membersToRemove: readonly string[],
    membersToAdd: readonly string[],
    options?: OperationOptions,
  ): Promise<BatchResult<GroupMemberChange>> {
    const operation = 'updateGroupMembers';
    encodeSegment(label, 'label', operation);
    const removals = membersToRemove.length > 0 ? this.resolveXnames(membersToRemove, operation) : [];
    const additions = membersToAdd.length > 0 ? this.resolveXnames(membersToAdd, operation) : [];
    if (removals.length === 0 && additions.length === 0) {
      throw invalidArgument('updateGroupMembers requires members to remove or add', { operation });
    }
    const removing = new Set(removals);
    const conflicting = additions.filter((xname) => removing.has(xname));
    if (conflicting.length > 0) {
      throw invalidArgument(`Members cannot be both removed and added: ${conflicting.join(', ')}`, { operation });
    }

    return dispatchPerHost(
      [...removals, ...additions],
      this.fanOutContext(operation, options),
      async (xname): Promise<GroupMemberChange> => {
        if (removing.has(xname)) {
          await this.send(
            { operation, method: 'DELETE', resource: 'group', id: label, subresource: 'members', subId: xname },
            options,
          );
          return { xname, action: 'removed' };
        }
        await this.send(
          { operation, method: 'POST', resource: 'group', id: label, subresource: 'members', body: { id: xname } },
          options,
        );
        return { xname, action: 'added' };
      },
    );
  }

  async migrateGroupMembers(
    targetLabel: string,
    parentLabel: string,
    selector: NodeSelector,
    options?: OperationOptions,
  ): Promise<GroupMigration> {
    const operation = 'migrateGroupMembers';
    encodeSegment(targetLabel, 'targetLabel', operation);
    encodeSegment(parentLabel, 'parentLabel', operation);
    if (targetLabel === parentLabel) {
      throw invalidArgument('Target and parent group must differ', { operation });
    }
    const hosts = this.resolveXnames(selector, operation);

    const [target, parent] = await Promise.all([
      this.getGroup(targetLabel, options),
      this.getGroup(parentLabel, options),
    ]);
    const parentMembers = new Set(parent.members);
    const strangers = hosts.filter((xname) => !parentMembers.has(xname));
    if (strangers.length > 0) {
      throw invalidArgument(`Nodes '${strangers.join(', ')}' are not members of group "${parentLabel}"`, {
        operation,
      });
    }

    // A host joins the target before it leaves the parent.
    const moved = await dispatchPerHost(hosts, this.fanOutContext(operation, options), async (xname) => {
      await this.send(
        {
          operation,
          method: 'POST',
          resource: 'group',
          id: targetLabel,
          subresource: 'members',
          body: { id: xname },
        },
        options,
      );
      await this.send(
        { operation, method: 'DELETE', resource: 'group', id: parentLabel, subresource: 'members', subId: xname },
        options,
      );
      return xname;
    });

    const movedHosts = new Set(outcomesOf(moved).filter((outcome) => outcome.ok).map((outcome) => outcome.host));
    this.logger.info('ochami.group.migrated', {
      target: targetLabel,
      parent: parentLabel,
      hosts: hosts.length,
      moved: movedHosts.size,
    });
    return {
      moved,
      targetMembers: [...new Set([...target.members, ...movedHosts])].sort(),
      parentMembers: [...new Set(parent.members.filter((xname) => !movedHosts.has(xname)))].sort(),
    };
  }

  // ==========================================================================
  // Components
  // ==========================================================================

  async getAllNodes(nidOnly = false, options?: OperationOptions): Promise<Component[]> {
    return this.getComponents({ type: 'Node', nidOnly }, options);
  }

  // Every node is visible to an OCHAMI token.
  async getNodeMetadataAvailable(options?: OperationOptions): Promise<Component[]> {
    return this.getAllNodes(true, options);
  }

  async getComponents(filter: ComponentFilter, options?: OperationOptions): Promise<Component[]> {
    return this.getJson(
      { operation: 'getComponents', method: 'GET', resource: 'component', query: componentQuery(filter) },
      componentListSchema,
      options,
    );
  }

  async getNodeInventory(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<Component>> {
    const operation = 'getNodeInventory';
    const hosts = this.resolveXnames(selector, operation);
    return dispatchPerHost(hosts, this.fanOutContext(operation, options), (host) =>
      this.getJson({ operation, method: 'GET', resource: 'component', id: host }, componentSchema, options),
    );
  }

  async postNodes(components: readonly Component[], force: boolean, options?: OperationOptions): Promise<void> {
    if (components.length === 0) {
      throw invalidArgument('postNodes requires at least one component', { operation: 'postNodes' });
    }
    return this.send(
      {
        operation: 'postNodes',
        method: 'POST',
        resource: 'component',
        body: { Components: components.map(toComponentWire), Force: force },
      },
      options,
    );
  }

  async deleteNode(xname: string, options?: OperationOptions): Promise<void> {
    return this.send({ operation: 'deleteNode', method: 'DELETE', resource: 'component', id: xname }, options);
  }

  // ==========================================================================
  // Hardware inventory
  // ==========================================================================

  async getHardwareInventory(
    selector: NodeSelector,
    options?: OperationOptions,
  ): Promise<BatchResult<HardwareInventoryRecord>> {
    const operation = 'getHardwareInventory';
    const hosts = this.resolveXnames(selector, operation);
    return dispatchPerHost(hosts, this.fanOutContext(operation, options), (host) =>
      this.getJson(
        { operation, method: 'GET', resource: 'hardware-inventory', id: host },
        hardwareRecordSchema,
        options,
      ),
    );
  }

  async queryHardwareInventory(
    xname: string,
    query: HardwareInventoryQuery = {},
    options?: OperationOptions,
  ): Promise<HardwareInventoryQueryResult> {
    return this.getJson(
      {
        operation: 'queryHardwareInventory',
        method: 'GET',
        resource: 'hardware-query',
        id: xname,
        query: {
          type: query.type,
          children: query.children,
          parents: query.parents,
          partition: query.partition,
          format: query.format,
        },
      },
      hardwareQuerySchema,
      options,
    );
  }

  async postHardwareInventory(records: readonly HardwareInventoryRecord[], options?: OperationOptions): Promise<void> {
    if (records.length === 0) {
      throw invalidArgument('postHardwareInventory requires at least one record', {
        operation: 'postHardwareInventory',
      });
    }
    return this.send(
      {
        operation: 'postHardwareInventory',
        method: 'POST',
        resource: 'hardware-inventory',
        body: { Hardware: records.map(toHardwareRecordWire) },
      },
      options,
    );
  }

  // ==========================================================================
  // Redfish endpoints
  // ==========================================================================

  async getRedfishEndpoints(filter: RedfishEndpointFilter = {}, options?: OperationOptions): Promise<RedfishEndpoint[]> {
    return this.getJson(
      {
        operation: 'getRedfishEndpoints',
        method: 'GET',
        resource: 'redfish-endpoint',
        query: {
          id: filter.id,
          fqdn: filter.fqdn,
          type: filter.type,
          uuid: filter.uuid,
          macaddr: filter.macAddr,
          ipaddress: filter.ipAddress,
          laststatus: filter.lastStatus,
        },
      },
      redfishEndpointListSchema,
      options,
    );
  }

  async addRedfishEndpoint(endpoint: RedfishEndpoint, options?: OperationOptions): Promise<void> {
    return this.send(
      {
        operation: 'addRedfishEndpoint',
        method: 'POST',
        resource: 'redfish-endpoint',
        body: { RedfishEndpoints: [toRedfishEndpointWire(endpoint)] },
      },
      options,
    );
  }

  async updateRedfishEndpoint(endpoint: RedfishEndpoint, options?: OperationOptions): Promise<void> {
    return this.send(
      {
        operation: 'updateRedfishEndpoint',
        method: 'PUT',
        resource: 'redfish-endpoint',
        id: endpoint.id,
        body: toRedfishEndpointWire(endpoint),
      },
      options,
    );
  }

  async deleteRedfishEndpoint(id: string, options?: OperationOptions): Promise<void> {
    return this.send(
      { operation: 'deleteRedfishEndpoint', method: 'DELETE', resource: 'redfish-endpoint', id },
      options,
    );
  }

  // ==========================================================================
  // Ethernet interfaces
  // ==========================================================================

  async getEthernetInterfaces(
    filter: EthernetInterfaceFilter = {},
    options?: OperationOptions,
  ): Promise<EthernetInterface[]> {
    return this.getJson(
      {
        operation: 'getEthernetInterfaces',
        method: 'GET',
        resource: 'ethernet-interface',
        query: {
          MACAddress: filter.macAddress,
          IPAddress: filter.ipAddress,
          Network: filter.network,
          ComponentID: filter.componentId,
          Type: filter.type,
          OlderThan: filter.olderThan,
          NewerThan: filter.newerThan,
        },
      },
      ethernetInterfaceListSchema,
      options,
    );
  }

  async getEthernetInterface(id: string, options?: OperationOptions): Promise<EthernetInterface> {
    return this.getJson(
      { operation: 'getEthernetInterface', method: 'GET', resource: 'ethernet-interface', id },
      ethernetInterfaceSchema,
      options,
    );
  }

  async addEthernetInterface(ethernetInterface: EthernetInterface, options?: OperationOptions): Promise<void> {
    if (ethernetInterface.macAddress.trim() === '') {
      throw invalidArgument('Ethernet interface MAC address must not be empty', { operation: 'addEthernetInterface' });
    }
    return this.send(
      {
        operation: 'addEthernetInterface',
        method: 'POST',
        resource: 'ethernet-interface',
        body: toEthernetInterfaceWire(ethernetInterface),
      },
      options,
    );
  }

  async updateEthernetInterface(id: string, patch: EthernetInterfacePatch, options?: OperationOptions): Promise<void> {
    const operation = 'updateEthernetInterface';
    if (patch.description === undefined && patch.ipAddresses === undefined) {
      throw invalidArgument('Ethernet interface update must change the description or the IP addresses', {
        operation,
      });
    }
    return this.send(
      { operation, method: 'PATCH', resource: 'ethernet-interface', id, body: toEthernetInterfacePatchWire(patch) },
      options,
    );
  }

  async deleteEthernetInterface(id: string, options?: OperationOptions): Promise<void> {
    return this.send(
      { operation: 'deleteEthernetInterface', method: 'DELETE', resource: 'ethernet-interface', id },
      options,
    );
  }

  async deleteAllEthernetInterfaces(options?: OperationOptions): Promise<void> {
    await this.send(
      { operation: 'deleteAllEthernetInterfaces', method: 'DELETE', resource: 'ethernet-interface' },
      options,
    );
    this.logger.warn('ochami.ethernet.deleted_all', {});
  }

  async getIpAddresses(id: string, options?: OperationOptions): Promise<IpAddressMapping[]> {
    return this.getJson(
      { operation: 'getIpAddresses', method: 'GET', resource: 'ethernet-interface', id, subresource: 'IPAddresses' },
      ipAddressListSchema,
      options,
    );
  }

  async addIpAddress(id: string, mapping: IpAddressMapping, options?: OperationOptions): Promise<void> {
    const operation = 'addIpAddress';
    if (mapping.ipAddress.trim() === '') {
      throw invalidArgument('IP address must not be empty', { operation });
    }
    return this.send(
      {
        operation,
        method: 'POST',
        resource: 'ethernet-interface',
        id,
        subresource: 'IPAddresses',
        body: toIpAddressWire(mapping),
      },
      options,
    );
  }

  async deleteIpAddress(id: string, ipAddress: string, options?: OperationOptions): Promise<void> {
    return this.send(
      {
        operation: 'deleteIpAddress',
        method: 'DELETE',
        resource: 'ethernet-interface',
        id,
        subresource: 'IPAddresses',
        subId: ipAddress,
      },
      options,
    );
  }

  // ==========================================================================
  // Boot parameters
  // ==========================================================================

  async getAllBootParameters(options?: OperationOptions): Promise<BootParameters[]> {
    return this.getJson(
      { operation: 'getAllBootParameters', method: 'GET', resource: 'boot-parameters' },
      bootParametersListSchema,
      options,
    );
  }

  async getBootParameters(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<BootParameters>> {
    const operation = 'getBootParameters';
    const hosts = this.resolve(selector);
    return dispatchInBatches(hosts, this.settings.batchSize, this.fanOutContext(operation, options), async (batch) => {
      const entries = await this.getJson(
        { operation, method: 'GET', resource: 'boot-parameters', query: { name: batch } },
        bootParametersListSchema,
        options,
      );
      const values: HostValues<BootParameters> = new Map();
      for (const entry of entries) {
        for (const host of entry.hosts) {
          if (!values.has(host)) {
            values.set(host, entry);
          }
        }
      }
      return values;
    });
  }

  async addBootParameters(bootParameters: BootParameters, options?: OperationOptions): Promise<void> {
    return this.send(this.bootParametersDescriptor('addBootParameters', 'POST', bootParameters), options);
  }

  async updateBootParameters(bootParameters: BootParameters, options?: OperationOptions): Promise<void> {
    return this.send(this.bootParametersDescriptor('updateBootParameters', 'PATCH', bootParameters), options);
  }

  async deleteBootParameters(bootParameters: BootParameters, options?: OperationOptions): Promise<void> {
    return this.send(this.bootParametersDescriptor('deleteBootParameters', 'DELETE', bootParameters), options);
  }

  // ==========================================================================
  // Power
  // ==========================================================================

  async getPowerStatus(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<PowerStatus>> {
    const operation = 'getPowerStatus';
    const hosts = this.resolve(selector);
    return dispatchInBatches(hosts, this.settings.batchSize, this.fanOutContext(operation, options), async (batch) => {
      const statuses = await this.getJson(
        { operation, method: 'GET', resource: 'power-status', query: { xname: batch } },
        powerStatusListSchema,
        options,
      );
      const values: HostValues<PowerStatus> = new Map();
      for (const status of statuses) {
        values.set(status.xname, status);
      }
      return values;
    });
  }

  async powerOn(selector: NodeSelector, options?: OperationOptions): Promise<BatchResult<PowerTransitionTask>> {
    return this.transition('powerOn', 'on', selector, options);
  }

  async powerOff(
    selector: NodeSelector,
    force: boolean,
    options?: OperationOptions,
  ): Promise<BatchResult<PowerTransitionTask>> {
    return this.transition('powerOff', force ? 'force-off' : 'soft-off', selector, options);
  }

  async powerReset(
    selector: NodeSelector,
    force: boolean,
    options?: OperationOptions,
  ): Promise<BatchResult<PowerTransitionTask>> {
    return this.transition('powerReset', force ? 'hard-restart' : 'soft-restart', selector, options);
  }

  // ==========================================================================
  // Node resolution
  // ==========================================================================

  async nidToXname(input: string, isRegex: boolean, options?: OperationOptions): Promise<string[]> {
    const operation = 'nidToXname';
    if (input.trim() === '') {
      throw invalidArgument('Node name list must not be empty', { operation });
    }

    if (isRegex) {
      const patterns = compilePatterns(input, operation);
      const nodes = await this.getAllNodes(true, options);
      return nodes
        .filter((node) => {
          if (node.nid === undefined) {
            return false;
          }
          const name = `nid${String(node.nid).padStart(6, '0')}`;
          return patterns.some((pattern) => pattern.test(name));
        })
        .map((node) => node.id);
    }

    const nids = expandHostlist(input, { maxHosts: this.settings.maxHosts }).map((name) => parseNid(name, operation));
    const nodes = await this.getComponents({ nids, nidOnly: true }, options);
    const xnameByNid = new Map<number, string>();
    for (const node of nodes) {
      if (node.nid !== undefined) {
        xnameByNid.set(node.nid, node.id);
      }
    }
    const xnames: string[] = [];
    for (const nid of nids) {
      const xname = xnameByNid.get(nid);
      if (xname !== undefined) {
        xnames.push(xname);
      }
    }
    return xnames;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private resolve(selector: NodeSelector): string[] {
    return resolveSelector(selector, { maxHosts: this.settings.maxHosts });
  }

  /** Hosts that end up in a request path, checked before anything is sent. */
  private resolveXnames(selector: NodeSelector, operation: string): string[] {
    const hosts = this.resolve(selector);
    for (const host of hosts) {
      encodeSegment(host, 'xname', operation);
    }
    return hosts;
  }

  private fanOutContext(operation: string, options?: OperationOptions): FanOutContext {
    return { operation, logger: this.logger, signal: options?.signal };
  }

  private async getJson<S extends ZodTypeAny>(
    descriptor: RequestDescriptor,
    schema: S,
    options?: OperationOptions,
  ): Promise<output<S>> {
    const request = buildRequest(descriptor, this.settings.endpoint);
    const raw = await this.bridge.execute(request, { signal: options?.signal });
    return mapJsonResponse(raw, schema, { operation: request.operation, method: request.method, url: request.url });
  }

  private async send(descriptor: RequestDescriptor, options?: OperationOptions): Promise<void> {
    const request = buildRequest(descriptor, this.settings.endpoint);
    const raw = await this.bridge.execute(request, { signal: options?.signal });
    mapEmptyResponse(raw, { operation: request.operation, method: request.method, url: request.url });
  }

  private bootParametersDescriptor(
    operation: string,
    method: 'POST' | 'PATCH' | 'DELETE',
    bootParameters: BootParameters,
  ): RequestDescriptor {
    const targets = bootParameters.hosts.length + (bootParameters.macs?.length ?? 0) + (bootParameters.nids?.length ?? 0);
    if (targets === 0) {
      throw invalidArgument('Boot parameters must name at least one host, MAC address or NID', { operation });
    }
    return { operation, method, resource: 'boot-parameters', body: toBootParametersWire(bootParameters) };
  }

  private async transition(
    operation: string,
    powerOperation: PowerOperation,
    selector: NodeSelector,
    options?: OperationOptions,
  ): Promise<BatchResult<PowerTransitionTask>> {
    const hosts = this.resolve(selector);
    return dispatchInBatches(hosts, this.settings.batchSize, this.fanOutContext(operation, options), async (batch) => {
      const created = await this.getJson(
        {
          operation,
          method: 'POST',
          resource: 'power-transition',
          body: { operation: powerOperation, location: batch.map((xname) => ({ xname })) },
        },
        transitionCreatedSchema,
        options,
      );
      this.logger.info('ochami.power.transition', {
        operation: powerOperation,
        transitionId: created.transitionId,
        hosts: batch.length,
      });

      const transition = await this.waitForTransition(created.transitionId, operation, options);
      const values: HostValues<PowerTransitionTask> = new Map();
      for (const task of transition.tasks) {
        values.set(
          task.xname,
          task.status === SUCCEEDED_TASK_STATE ? task : taskFailure(task, powerOperation, operation),
        );
      }
      return values;
    });
  }

  /** Polls a PCS transition until it reaches a terminal state. */
  private async waitForTransition(
    transitionId: string,
    operation: string,
    options?: OperationOptions,
  ): Promise<PowerTransition> {
    const { powerPollIntervalMs, powerPollMaxAttempts } = this.settings;
    for (let attempt = 1; attempt <= powerPollMaxAttempts; attempt += 1) {
      const transition = await this.getJson(
        { operation, method: 'GET', resource: 'power-transition', id: transitionId },
        powerTransitionSchema,
        options,
      );
      if (TERMINAL_TRANSITION_STATES.has(transition.status)) {
        return transition;
      }
      this.logger.debug('ochami.power.poll', { transitionId, attempt, status: transition.status });
      if (attempt < powerPollMaxAttempts) {
        await sleep(powerPollIntervalMs, undefined, options?.signal ? { signal: options.signal } : undefined);
      }
    }
    throw new DispatchError(
      'timeout',
      `Power transition ${transitionId} did not complete after ${powerPollMaxAttempts} polls`,
      { operation },
    );
  }
}

export function createOchamiDispatcher(config: OchamiConfig): OchamiDispatcher {
  return new OchamiDispatcher(config);
}

function requireLabels(labels: readonly string[], operation: string): string[] {
  if (labels.length === 0) {
    throw invalidArgument('At least one group label is required', { operation });
  }
  return labels.map((label) => {
    const trimmed = label.trim();
    if (trimmed === '') {
      throw invalidArgument('Group labels must not be empty', { operation });
    }
    return trimmed;
  });
}

function componentQuery(filter: ComponentFilter): QueryParams {
  return {
    id: filter.ids,
    type: filter.type,
    state: filter.state,
    flag: filter.flag,
    role: filter.role,
    subrole: filter.subRole,
    enabled: filter.enabled,
    softwarestatus: filter.softwareStatus,
    subtype: filter.subtype,
    arch: filter.arch,
    class: filter.class,
    nid: filter.nids,
    nid_start: filter.nidStart,
    nid_end: filter.nidEnd,
    partition: filter.partition,
    group: filter.group,
    stateonly: filter.stateOnly || undefined,
    flagonly: filter.flagOnly || undefined,
    roleonly: filter.roleOnly || undefined,
    nidonly: filter.nidOnly || undefined,
  };
}

function compilePatterns(input: string, operation: string): RegExp[] {
  const sources = input
    .split(',')
    .map((source) => source.trim())
    .filter((source) => source !== '');
  if (sources.length === 0) {
    throw invalidArgument('At least one node name pattern is required', { operation });
  }
  return sources.map((source) => {
    try {
      return new RegExp(source);
    } catch (error) {
      throw invalidArgument(`Invalid node name pattern "${source}"`, { operation, cause: error });
    }
  });
}

function parseNid(name: string, operation: string): number {
  if (!name.startsWith('nid')) {
    throw invalidArgument(`Node name "${name}" is not valid, "nid" prefix missing`, { operation });
  }
  const digits = name.slice(3);
  if (!/^\d+$/.test(digits)) {
    throw invalidArgument(`Node name "${name}" does not end in a node number`, { operation });
  }
  return Number(digits);
}

function taskFailure(task: PowerTransitionTask, powerOperation: PowerOperation, operation: string): DispatchError {
  const detail = task.error ?? task.statusDescription ?? `task ${task.status}`;
  return new DispatchError('server_error', `Power ${powerOperation} failed for ${task.xname}: ${detail}`, {
    operation,
    host: task.xname,
    backendMessage: task.error ?? task.statusDescription,
  });
}
