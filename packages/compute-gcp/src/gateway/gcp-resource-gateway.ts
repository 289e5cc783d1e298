/**
 * GCP Resource Gateway
 *
 * IResourceGateway over the @google-cloud/compute SDK clients. One call per
 * method, no waiting: mutating calls hand back the operation record for the
 * OperationPoller. Every SDK failure surfaces as ComputeIoError.
 */

import {
  AcceleratorTypesClient,
  DiskTypesClient,
  DisksClient,
  ImagesClient,
  InstanceTemplatesClient,
  InstancesClient,
  MachineTypesClient,
  NetworksClient,
  RegionsClient,
  SnapshotsClient,
  SubnetworksClient,
  ZoneOperationsClient,
  ZonesClient,
} from "@google-cloud/compute";
import { ComputeIoError, noopLog } from "@computekit/compute-common";
import type { ComputeLogCallback, ComputeOperation } from "@computekit/compute-common";
import type { IResourceGateway } from "../managers/interfaces";
import type {
  AcceleratorType,
  DiskType,
  Image,
  Instance,
  InstanceTemplate,
  MachineType,
  Metadata,
  Network,
  Region,
  Snapshot,
  Subnetwork,
  Zone,
} from "../types";

/**
 * SDK clients used by the gateway.
 */
export interface GcpComputeClients {
  instances: InstancesClient;
  disks: DisksClient;
  zoneOperations: ZoneOperationsClient;
  regions: RegionsClient;
  zones: ZonesClient;
  machineTypes: MachineTypesClient;
  diskTypes: DiskTypesClient;
  images: ImagesClient;
  acceleratorTypes: AcceleratorTypesClient;
  networks: NetworksClient;
  subnetworks: SubnetworksClient;
  instanceTemplates: InstanceTemplatesClient;
  snapshots: SnapshotsClient;
}

/**
 * Options handed to every SDK client constructor.
 */
export type GcpClientOptions = {
  projectId?: string;
  keyFilename?: string;
  credentials?: {
    client_email: string;
    private_key: string;
  };
};

export class GcpResourceGateway implements IResourceGateway {
  constructor(
    private readonly clients: GcpComputeClients,
    private readonly log: ComputeLogCallback = noopLog
  ) {}

  /**
   * Create every SDK client with the same options.
   */
  static createClients(options: GcpClientOptions = {}): GcpComputeClients {
    return {
      instances: new InstancesClient(options),
      disks: new DisksClient(options),
      zoneOperations: new ZoneOperationsClient(options),
      regions: new RegionsClient(options),
      zones: new ZonesClient(options),
      machineTypes: new MachineTypesClient(options),
      diskTypes: new DiskTypesClient(options),
      images: new ImagesClient(options),
      acceleratorTypes: new AcceleratorTypesClient(options),
      networks: new NetworksClient(options),
      subnetworks: new SubnetworksClient(options),
      instanceTemplates: new InstanceTemplatesClient(options),
      snapshots: new SnapshotsClient(options),
    };
  }

  // -- Locations --

  listRegions(project: string): Promise<Region[]> {
    return this.call("list regions", async () => {
      const [regions] = await this.clients.regions.list({ project });
      return regions;
    });
  }

  listZones(project: string): Promise<Zone[]> {
    return this.call("list zones", async () => {
      const [zones] = await this.clients.zones.list({ project });
      return zones;
    });
  }

  getZone(project: string, zone: string): Promise<Zone> {
    return this.call(`get zone ${zone}`, async () => {
      const [result] = await this.clients.zones.get({ project, zone });
      return result;
    });
  }

  // -- Catalog --

  listMachineTypes(project: string, zone: string): Promise<MachineType[]> {
    return this.call(`list machine types in ${zone}`, async () => {
      const [machineTypes] = await this.clients.machineTypes.list({ project, zone });
      return machineTypes;
    });
  }

  listDiskTypes(project: string, zone: string): Promise<DiskType[]> {
    return this.call(`list disk types in ${zone}`, async () => {
      const [diskTypes] = await this.clients.diskTypes.list({ project, zone });
      return diskTypes;
    });
  }

  listImages(project: string): Promise<Image[]> {
    return this.call("list images", async () => {
      const [images] = await this.clients.images.list({ project });
      return images;
    });
  }

  getImage(project: string, image: string): Promise<Image> {
    return this.call(`get image ${image}`, async () => {
      const [result] = await this.clients.images.get({ project, image });
      return result;
    });
  }

  listAcceleratorTypes(project: string, zone: string): Promise<AcceleratorType[]> {
    return this.call(`list accelerator types in ${zone}`, async () => {
      const [acceleratorTypes] = await this.clients.acceleratorTypes.list({ project, zone });
      return acceleratorTypes;
    });
  }

  // -- Networking --

  listNetworks(project: string): Promise<Network[]> {
    return this.call("list networks", async () => {
      const [networks] = await this.clients.networks.list({ project });
      return networks;
    });
  }

  listSubnetworks(project: string, region: string): Promise<Subnetwork[]> {
    return this.call(`list subnetworks in ${region}`, async () => {
      const [subnetworks] = await this.clients.subnetworks.list({ project, region });
      return subnetworks;
    });
  }

  // -- Instances --

  getInstance(project: string, zone: string, instance: string): Promise<Instance> {
    return this.call(`get instance ${instance}`, async () => {
      const [result] = await this.clients.instances.get({ project, zone, instance });
      return result;
    });
  }

  insertInstance(project: string, zone: string, instance: Instance): Promise<ComputeOperation> {
    return this.call(`insert instance ${instance.name ?? ""}`, async () => {
      const [operation] = await this.clients.instances.insert({
        project,
        zone,
        instanceResource: instance,
      });
      return toComputeOperation(operation, zone);
    });
  }

  insertInstanceWithTemplate(
    project: string,
    zone: string,
    instance: Instance,
    templateLink: string
  ): Promise<ComputeOperation> {
    return this.call(`insert instance ${instance.name ?? ""} from template`, async () => {
      const [operation] = await this.clients.instances.insert({
        project,
        zone,
        instanceResource: instance,
        sourceInstanceTemplate: templateLink,
      });
      return toComputeOperation(operation, zone);
    });
  }

  deleteInstance(project: string, zone: string, instance: string): Promise<ComputeOperation> {
    return this.call(`delete instance ${instance}`, async () => {
      const [operation] = await this.clients.instances.delete({ project, zone, instance });
      return toComputeOperation(operation, zone);
    });
  }

  aggregatedListInstances(project: string, filter: string): Promise<Map<string, Instance[]>> {
    return this.call("aggregated list instances", async () => {
      const byScope = new Map<string, Instance[]>();
      const iterable = this.clients.instances.aggregatedListAsync({ project, filter });
      for await (const [scope, scopedList] of iterable) {
        if (scopedList.instances?.length) {
          byScope.set(scope, scopedList.instances);
        }
      }
      return byScope;
    });
  }

  setInstanceMetadata(
    project: string,
    zone: string,
    instance: string,
    metadata: Metadata
  ): Promise<ComputeOperation> {
    return this.call(`set metadata on ${instance}`, async () => {
      const [operation] = await this.clients.instances.setMetadata({
        project,
        zone,
        instance,
        metadataResource: metadata,
      });
      return toComputeOperation(operation, zone);
    });
  }

  // -- Instance templates --

  getInstanceTemplate(project: string, name: string): Promise<InstanceTemplate> {
    return this.call(`get instance template ${name}`, async () => {
      const [template] = await this.clients.instanceTemplates.get({ project, instanceTemplate: name });
      return template;
    });
  }

  insertInstanceTemplate(project: string, template: InstanceTemplate): Promise<ComputeOperation> {
    return this.call(`insert instance template ${template.name ?? ""}`, async () => {
      const [operation] = await this.clients.instanceTemplates.insert({
        project,
        instanceTemplateResource: template,
      });
      return toComputeOperation(operation);
    });
  }

  deleteInstanceTemplate(project: string, name: string): Promise<ComputeOperation> {
    return this.call(`delete instance template ${name}`, async () => {
      const [operation] = await this.clients.instanceTemplates.delete({
        project,
        instanceTemplate: name,
      });
      return toComputeOperation(operation);
    });
  }

  listInstanceTemplates(project: string): Promise<InstanceTemplate[]> {
    return this.call("list instance templates", async () => {
      const [templates] = await this.clients.instanceTemplates.list({ project });
      return templates;
    });
  }

  // -- Snapshots --

  createDiskSnapshot(
    project: string,
    zone: string,
    disk: string,
    snapshot: Snapshot
  ): Promise<ComputeOperation> {
    return this.call(`create snapshot of disk ${disk}`, async () => {
      const [operation] = await this.clients.disks.createSnapshot({
        project,
        zone,
        disk,
        snapshotResource: snapshot,
      });
      return toComputeOperation(operation, zone);
    });
  }

  getSnapshot(project: string, name: string): Promise<Snapshot> {
    return this.call(`get snapshot ${name}`, async () => {
      const [snapshot] = await this.clients.snapshots.get({ project, snapshot: name });
      return snapshot;
    });
  }

  deleteSnapshot(project: string, name: string): Promise<ComputeOperation> {
    return this.call(`delete snapshot ${name}`, async () => {
      const [operation] = await this.clients.snapshots.delete({ project, snapshot: name });
      return toComputeOperation(operation);
    });
  }

  // -- Operations --

  getZoneOperation(project: string, zone: string, operation: string): Promise<ComputeOperation> {
    return this.call(`get operation ${operation}`, async () => {
      const [result] = await this.clients.zoneOperations.get({ project, zone, operation });
      return result;
    });
  }

  private async call<T>(context: string, fn: () => Promise<T>): Promise<T> {
    this.log(`compute: ${context}`, "debug");
    try {
      return await fn();
    } catch (error) {
      throw ComputeIoError.wrap(error, `Failed to ${context}`);
    }
  }
}

/**
 * Read the operation record out of the handle returned by a mutating call.
 *
 * The SDK wraps the raw Operation in an LRO handle: the record sits in
 * `latestResponse`, with `name` mirrored on the handle itself.
 */
export function toComputeOperation(handle: unknown, fallbackZone?: string): ComputeOperation {
  const latest = field(handle, "latestResponse");
  const record = typeof latest === "object" && latest !== null ? latest : handle;

  const name = stringField(record, "name") ?? stringField(handle, "name");
  if (!name) {
    throw new ComputeIoError("Remote call returned no operation name");
  }

  const status = field(record, "status");
  return {
    name,
    zone: stringField(record, "zone") ?? fallbackZone ?? null,
    status: typeof status === "string" || typeof status === "number" ? status : null,
    error: null,
  };
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function stringField(value: unknown, key: string): string | undefined {
  const result = field(value, key);
  return typeof result === "string" && result.length > 0 ? result : undefined;
}
