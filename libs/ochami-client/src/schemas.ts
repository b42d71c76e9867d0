import { z } from 'zod';
import type {
  BootParameters,
  Component,
  EthernetInterface,
  EthernetInterfacePatch,
  Group,
  HardwareInventoryQueryResult,
  HardwareInventoryRecord,
  IpAddressMapping,
  PowerStatus,
  PowerTransition,
  PowerTransitionTask,
  RedfishEndpoint,
} from '@libs/backend-dispatcher';

/**
 * Wire schemas for SMD, BSS and PCS payloads.
 *
 * Each schema validates what the service sends and converts it into the
 * backend-neutral domain type. The `to*Wire` helpers go the other way for
 * request bodies.
 */

// ============================================================
// SMD: groups
// ============================================================

const groupWire = z.object({
  label: z.string(),
  description: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  exclusiveGroup: z.string().nullish(),
  members: z.object({ ids: z.array(z.string()).nullish() }).nullish(),
});

export const groupSchema = groupWire.transform(
  (group): Group => ({
    label: group.label,
    description: group.description ?? undefined,
    tags: group.tags ?? undefined,
    exclusiveGroup: group.exclusiveGroup ?? undefined,
    members: group.members?.ids ?? [],
  }),
);

export const groupListSchema = z.array(groupSchema);

export function toGroupWire(group: Group) {
  return {
    label: group.label,
    description: group.description,
    tags: group.tags,
    exclusiveGroup: group.exclusiveGroup,
    members: { ids: group.members },
  };
}

// ============================================================
// SMD: components
// ============================================================

const componentWire = z.object({
  ID: z.string(),
  Type: z.string().optional(),
  State: z.string().optional(),
  Flag: z.string().optional(),
  Enabled: z.boolean().nullish(),
  SoftwareStatus: z.string().optional(),
  Role: z.string().optional(),
  SubRole: z.string().optional(),
  NID: z.number().int().optional(),
  Subtype: z.string().optional(),
  NetType: z.string().optional(),
  Arch: z.string().optional(),
  Class: z.string().optional(),
  ReservationDisabled: z.boolean().optional(),
  Locked: z.boolean().optional(),
});

export const componentSchema = componentWire.transform(
  (component): Component => ({
    id: component.ID,
    type: component.Type,
    state: component.State,
    flag: component.Flag,
    enabled: component.Enabled ?? undefined,
    softwareStatus: component.SoftwareStatus,
    role: component.Role,
    subRole: component.SubRole,
    nid: component.NID,
    subtype: component.Subtype,
    netType: component.NetType,
    arch: component.Arch,
    class: component.Class,
    reservationDisabled: component.ReservationDisabled,
    locked: component.Locked,
  }),
);

export const componentListSchema = z
  .object({ Components: z.array(componentSchema).nullish() })
  .transform((payload) => payload.Components ?? []);

export function toComponentWire(component: Component) {
  return {
    ID: component.id,
    Type: component.type,
    State: component.state,
    Flag: component.flag,
    Enabled: component.enabled,
    SoftwareStatus: component.softwareStatus,
    Role: component.role,
    SubRole: component.subRole,
    NID: component.nid,
    Subtype: component.subtype,
    NetType: component.netType,
    Arch: component.arch,
    Class: component.class,
    ReservationDisabled: component.reservationDisabled,
    Locked: component.locked,
  };
}

// ============================================================
// SMD: hardware inventory
// ============================================================

const LOCATION_INFO_SUFFIX = 'LocationInfo';

export const hardwareRecordSchema = z
  .object({
    ID: z.string(),
    Type: z.string().optional(),
    Ordinal: z.number().int().optional(),
    Status: z.string().optional(),
    PopulatedFRU: z.record(z.unknown()).nullish(),
  })
  .catchall(z.unknown())
  .transform((record): HardwareInventoryRecord => {
    let locationInfo: Record<string, unknown> | undefined;
    for (const [key, value] of Object.entries(record)) {
      if (key.endsWith(LOCATION_INFO_SUFFIX) && isRecord(value)) {
        locationInfo = value;
        break;
      }
    }
    return {
      id: record.ID,
      type: record.Type,
      ordinal: record.Ordinal,
      status: record.Status,
      locationInfo,
      populatedFru: record.PopulatedFRU ?? undefined,
    };
  });

const hardwareRecordListSchema = z.array(hardwareRecordSchema);

export const hardwareQuerySchema = z
  .object({
    XName: z.string().nullish(),
    Format: z.string().nullish(),
  })
  .catchall(z.unknown())
  .transform((payload, ctx): HardwareInventoryQueryResult => {
    const categories: Record<string, HardwareInventoryRecord[]> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (key === 'XName' || key === 'Format' || !Array.isArray(value)) {
        continue;
      }
      const parsed = hardwareRecordListSchema.safeParse(value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key, ...(issue?.path ?? [])],
          message: issue?.message ?? 'Invalid hardware record',
        });
        return z.NEVER;
      }
      categories[key] = parsed.data;
    }
    return {
      xname: payload.XName ?? undefined,
      format: payload.Format ?? undefined,
      categories,
    };
  });

export function toHardwareRecordWire(record: HardwareInventoryRecord) {
  return {
    ID: record.id,
    Type: record.type,
    Ordinal: record.ordinal,
    Status: record.status,
    PopulatedFRU: record.populatedFru,
    ...(record.type && record.locationInfo ? { [`${record.type}${LOCATION_INFO_SUFFIX}`]: record.locationInfo } : {}),
  };
}

// ============================================================
// SMD: Redfish endpoints
// ============================================================

const redfishEndpointWire = z.object({
  ID: z.string(),
  Type: z.string().optional(),
  Name: z.string().optional(),
  Hostname: z.string().optional(),
  Domain: z.string().optional(),
  FQDN: z.string().optional(),
  Enabled: z.boolean().optional(),
  UUID: z.string().optional(),
  User: z.string().optional(),
  Password: z.string().optional(),
  UseSSDP: z.boolean().optional(),
  MACRequired: z.boolean().optional(),
  MACAddr: z.string().optional(),
  IPAddress: z.string().optional(),
  RediscoverOnUpdate: z.boolean().optional(),
  TemplateID: z.string().optional(),
  DiscoveryInfo: z
    .object({
      LastDiscoveryAttempt: z.string().optional(),
      LastDiscoveryStatus: z.string().optional(),
      RedfishVersion: z.string().optional(),
    })
    .nullish(),
});

export const redfishEndpointSchema = redfishEndpointWire.transform(
  (endpoint): RedfishEndpoint => ({
    id: endpoint.ID,
    type: endpoint.Type,
    name: endpoint.Name,
    hostname: endpoint.Hostname,
    domain: endpoint.Domain,
    fqdn: endpoint.FQDN,
    enabled: endpoint.Enabled,
    uuid: endpoint.UUID,
    user: endpoint.User,
    password: endpoint.Password,
    useSsdp: endpoint.UseSSDP,
    macRequired: endpoint.MACRequired,
    macAddr: endpoint.MACAddr,
    ipAddress: endpoint.IPAddress,
    rediscoverOnUpdate: endpoint.RediscoverOnUpdate,
    templateId: endpoint.TemplateID,
    discoveryInfo: endpoint.DiscoveryInfo
      ? {
          lastDiscoveryAttempt: endpoint.DiscoveryInfo.LastDiscoveryAttempt,
          lastDiscoveryStatus: endpoint.DiscoveryInfo.LastDiscoveryStatus,
          redfishVersion: endpoint.DiscoveryInfo.RedfishVersion,
        }
      : undefined,
  }),
);

export const redfishEndpointListSchema = z
  .object({ RedfishEndpoints: z.array(redfishEndpointSchema).nullish() })
  .transform((payload) => payload.RedfishEndpoints ?? []);

export function toRedfishEndpointWire(endpoint: RedfishEndpoint) {
  return {
    ID: endpoint.id,
    Type: endpoint.type,
    Name: endpoint.name,
    Hostname: endpoint.hostname,
    Domain: endpoint.domain,
    FQDN: endpoint.fqdn,
    Enabled: endpoint.enabled,
    UUID: endpoint.uuid,
    User: endpoint.user,
    Password: endpoint.password,
    UseSSDP: endpoint.useSsdp,
    MACRequired: endpoint.macRequired,
    MACAddr: endpoint.macAddr,
    IPAddress: endpoint.ipAddress,
    RediscoverOnUpdate: endpoint.rediscoverOnUpdate,
    TemplateID: endpoint.templateId,
  };
}

// ============================================================
// SMD: ethernet interfaces
// ============================================================

const ipAddressWire = z.object({ IPAddress: z.string(), Network: z.string().optional() });

export const ipAddressListSchema = z
  .array(ipAddressWire)
  .transform((entries): IpAddressMapping[] =>
    entries.map((entry) => ({ ipAddress: entry.IPAddress, network: entry.Network })),
  );

export function toIpAddressWire(mapping: IpAddressMapping) {
  return { IPAddress: mapping.ipAddress, Network: mapping.network };
}

const ethernetInterfaceWire = z.object({
  ID: z.string().optional(),
  Description: z.string().optional(),
  MACAddress: z.string(),
  IPAddresses: z.array(ipAddressWire).nullish(),
  LastUpdate: z.string().optional(),
  ComponentID: z.string().optional(),
  Type: z.string().optional(),
});

export const ethernetInterfaceSchema = ethernetInterfaceWire.transform(
  (iface): EthernetInterface => ({
    id: iface.ID,
    description: iface.Description,
    macAddress: iface.MACAddress,
    ipAddresses: (iface.IPAddresses ?? []).map((entry) => ({ ipAddress: entry.IPAddress, network: entry.Network })),
    lastUpdate: iface.LastUpdate,
    componentId: iface.ComponentID,
    type: iface.Type,
  }),
);

export const ethernetInterfaceListSchema = z.array(ethernetInterfaceSchema);

export function toEthernetInterfaceWire(iface: EthernetInterface) {
  return {
    ID: iface.id,
    Description: iface.description,
    MACAddress: iface.macAddress,
    IPAddresses: iface.ipAddresses.map(toIpAddressWire),
    ComponentID: iface.componentId,
    Type: iface.type,
  };
}

export function toEthernetInterfacePatchWire(patch: EthernetInterfacePatch) {
  return {
    Description: patch.description,
    IPAddresses: patch.ipAddresses?.map(toIpAddressWire),
  };
}

// ============================================================
// BSS: boot parameters
// ============================================================

export const bootParametersSchema = z
  .object({
    hosts: z.array(z.string()).nullish(),
    macs: z.array(z.string()).nullish(),
    nids: z.array(z.number().int()).nullish(),
    params: z.string().nullish(),
    kernel: z.string().nullish(),
    initrd: z.string().nullish(),
    'cloud-init': z.record(z.unknown()).nullish(),
  })
  .transform(
    (entry): BootParameters => ({
      hosts: entry.hosts ?? [],
      macs: entry.macs ?? undefined,
      nids: entry.nids ?? undefined,
      params: entry.params ?? '',
      kernel: entry.kernel ?? '',
      initrd: entry.initrd ?? '',
      cloudInit: entry['cloud-init'] ?? undefined,
    }),
  );

export const bootParametersListSchema = z.array(bootParametersSchema);

export function toBootParametersWire(bootParameters: BootParameters) {
  return {
    hosts: bootParameters.hosts,
    macs: bootParameters.macs,
    nids: bootParameters.nids,
    params: bootParameters.params,
    kernel: bootParameters.kernel,
    initrd: bootParameters.initrd,
    'cloud-init': bootParameters.cloudInit,
  };
}

// ============================================================
// PCS: power status and transitions
// ============================================================

export const powerStatusListSchema = z
  .object({
    status: z
      .array(
        z.object({
          xname: z.string(),
          powerState: z.string(),
          managementState: z.string(),
          error: z.string().nullish(),
          supportedPowerTransitions: z.array(z.string()).nullish(),
          lastUpdated: z.string().nullish(),
        }),
      )
      .nullish(),
  })
  .transform((payload): PowerStatus[] =>
    (payload.status ?? []).map((entry) => ({
      xname: entry.xname,
      powerState: entry.powerState,
      managementState: entry.managementState,
      error: entry.error || undefined,
      supportedPowerTransitions: entry.supportedPowerTransitions ?? [],
      lastUpdated: entry.lastUpdated ?? undefined,
    })),
  );

export const transitionCreatedSchema = z
  .object({ transitionID: z.string().min(1) })
  .transform((payload) => ({ transitionId: payload.transitionID }));

const transitionTaskSchema = z
  .object({
    xname: z.string(),
    taskStatus: z.string(),
    taskStatusDescription: z.string().nullish(),
    error: z.string().nullish(),
  })
  .transform(
    (task): PowerTransitionTask => ({
      xname: task.xname,
      status: task.taskStatus,
      statusDescription: task.taskStatusDescription || undefined,
      error: task.error || undefined,
    }),
  );

export const powerTransitionSchema = z
  .object({
    transitionID: z.string(),
    operation: z.string(),
    transitionStatus: z.string(),
    createTime: z.string().nullish(),
    taskCounts: z.record(z.number()).nullish(),
    tasks: z.array(transitionTaskSchema).nullish(),
  })
  .transform(
    (payload): PowerTransition => ({
      transitionId: payload.transitionID,
      operation: payload.operation,
      status: payload.transitionStatus,
      createdAt: payload.createTime ?? undefined,
      taskCounts: payload.taskCounts ?? undefined,
      tasks: payload.tasks ?? [],
    }),
  );

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
