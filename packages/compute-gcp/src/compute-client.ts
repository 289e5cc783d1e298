import {
  ComputeIoError,
  buildLabelsFilterString,
  byName,
  checkArgument,
  checkNotEmpty,
  checkNotNull,
  checkPositive,
  compareStrings,
  isDeprecated,
  mergeMetadataItems,
  nameFromSelfLink,
  processResourceList,
} from "@computekit/compute-common";
import type {
  ComputeOperation,
  MetadataItem,
  OperationError,
} from "@computekit/compute-common";
import type {
  DiskSnapshotResult,
  IOperationPoller,
  IResourceGateway,
  ISnapshotOrchestrator,
  SnapshotOptions,
  WaitOptions,
} from "./managers";
import type {
  AcceleratorType,
  DiskType,
  Image,
  Instance,
  InstanceTemplate,
  MachineType,
  Network,
  Region,
  Snapshot,
  Subnetwork,
  Zone,
} from "./types";

/**
 * Client for the Compute Engine API.
 *
 * Turns simple verbs into gateway calls: validates arguments up front,
 * accepts zone and region self links wherever a name is expected, filters and
 * sorts listings, and waits on long-running operations where a verb blocks.
 */
export class ComputeClient {
  constructor(
    private readonly gateway: IResourceGateway,
    private readonly poller: IOperationPoller,
    private readonly snapshots: ISnapshotOrchestrator
  ) {}

  // -- Locations --

  /**
   * Regions available to the project, sorted by name. Deprecated regions are excluded.
   */
  async getRegions(projectId: string): Promise<Region[]> {
    checkNotEmpty(projectId, "projectId");
    return processResourceList(
      await this.gateway.listRegions(projectId),
      (region) => !isDeprecated(region.deprecated),
      byName
    );
  }

  /**
   * Zones of the given region, sorted by name.
   *
   * @param regionLink - Self link of the region
   */
  async getZones(projectId: string, regionLink: string): Promise<Zone[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(regionLink, "regionLink");
    return processResourceList(
      await this.gateway.listZones(projectId),
      (zone) => equalsIgnoreCase(zone.region, regionLink),
      byName
    );
  }

  // -- Catalog --

  async getMachineTypes(projectId: string, zoneLink: string): Promise<MachineType[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    return processResourceList(
      await this.gateway.listMachineTypes(projectId, nameFromSelfLink(zoneLink)),
      (machineType) => !isDeprecated(machineType.deprecated),
      byName
    );
  }

  /** CPU platforms offered in the zone, sorted. */
  async getCpuPlatforms(projectId: string, zoneLink: string): Promise<string[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    const zone = await this.gateway.getZone(projectId, nameFromSelfLink(zoneLink));
    return processResourceList(zone.availableCpuPlatforms, undefined, compareStrings);
  }

  async getDiskTypes(projectId: string, zoneLink: string): Promise<DiskType[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    return processResourceList(
      await this.gateway.listDiskTypes(projectId, nameFromSelfLink(zoneLink)),
      (diskType) => !isDeprecated(diskType.deprecated),
      byName
    );
  }

  /** Disk types usable as a boot disk: local SSDs are excluded. */
  async getBootDiskTypes(projectId: string, zoneLink: string): Promise<DiskType[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    return processResourceList(
      await this.gateway.listDiskTypes(projectId, nameFromSelfLink(zoneLink)),
      (diskType) => !isDeprecated(diskType.deprecated) && !(diskType.name ?? "").startsWith("local-"),
      byName
    );
  }

  async getImages(projectId: string): Promise<Image[]> {
    checkNotEmpty(projectId, "projectId");
    return processResourceList(
      await this.gateway.listImages(projectId),
      (image) => !isDeprecated(image.deprecated),
      byName
    );
  }

  async getImage(projectId: string, imageName: string): Promise<Image> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(imageName, "imageName");
    return this.gateway.getImage(projectId, imageName);
  }

  async getAcceleratorTypes(projectId: string, zoneLink: string): Promise<AcceleratorType[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    return processResourceList(
      await this.gateway.listAcceleratorTypes(projectId, nameFromSelfLink(zoneLink)),
      (acceleratorType) => !isDeprecated(acceleratorType.deprecated),
      byName
    );
  }

  // -- Networking --

  async getNetworks(projectId: string): Promise<Network[]> {
    checkNotEmpty(projectId, "projectId");
    return processResourceList(await this.gateway.listNetworks(projectId), undefined, byName);
  }

  /**
   * Subnetworks of a network within a region, sorted by name.
   *
   * @param networkLink - Self link of the network
   * @param regionLink - Self link of the region
   */
  async getSubnetworks(projectId: string, networkLink: string, regionLink: string): Promise<Subnetwork[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(networkLink, "networkLink");
    checkNotEmpty(regionLink, "regionLink");
    return processResourceList(
      await this.gateway.listSubnetworks(projectId, nameFromSelfLink(regionLink)),
      (subnetwork) => equalsIgnoreCase(subnetwork.network, networkLink),
      byName
    );
  }

  // -- Instances --

  /**
   * Insert an instance. The instance must name its zone.
   *
   * @param templateLink - Self link of an instance template to build the instance from
   * @returns The insert operation, not yet waited on
   */
  async insertInstance(projectId: string, instance: Instance, templateLink?: string): Promise<ComputeOperation> {
    checkNotEmpty(projectId, "projectId");
    checkNotNull(instance, "instance");
    checkNotEmpty(instance.zone, "instance.zone");
    const zone = nameFromSelfLink(instance.zone);

    if (templateLink !== undefined) {
      checkNotEmpty(templateLink, "templateLink");
      return this.gateway.insertInstanceWithTemplate(projectId, zone, instance, templateLink);
    }
    return this.gateway.insertInstance(projectId, zone, instance);
  }

  async terminateInstance(projectId: string, zoneLink: string, instanceId: string): Promise<ComputeOperation> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    checkNotEmpty(instanceId, "instanceId");
    return this.gateway.deleteInstance(projectId, nameFromSelfLink(zoneLink), instanceId);
  }

  /**
   * Delete the instance only if it currently has the given status.
   *
   * @returns The delete operation, or undefined when the status did not match
   */
  async terminateInstanceWithStatus(
    projectId: string,
    zoneLink: string,
    instanceId: string,
    desiredStatus: string
  ): Promise<ComputeOperation | undefined> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    checkNotEmpty(instanceId, "instanceId");
    checkNotEmpty(desiredStatus, "desiredStatus");

    const zone = nameFromSelfLink(zoneLink);
    const instance = await this.gateway.getInstance(projectId, zone, instanceId);
    if (String(instance.status ?? "") !== desiredStatus) {
      return undefined;
    }
    return this.gateway.deleteInstance(projectId, zone, instanceId);
  }

  async getInstance(projectId: string, zoneLink: string, instanceId: string): Promise<Instance> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    checkNotEmpty(instanceId, "instanceId");
    return this.gateway.getInstance(projectId, nameFromSelfLink(zoneLink), instanceId);
  }

  /**
   * Instances in every zone of the project carrying all of the given labels.
   */
  async getInstancesWithLabel(projectId: string, labels: Record<string, string>): Promise<Instance[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotNull(labels, "labels");
    const byZone = await this.gateway.aggregatedListInstances(projectId, buildLabelsFilterString(labels));
    return [...byZone.values()].flat();
  }

  /**
   * Append metadata to an instance and wait for the update. Items whose key
   * already exists replace the existing entry; other existing entries are kept.
   *
   * @returns The error payload of the finished operation, if any
   */
  async appendInstanceMetadata(
    projectId: string,
    zoneLink: string,
    instanceId: string,
    items: MetadataItem[],
    timeoutMs: number,
    options: WaitOptions = {}
  ): Promise<OperationError | undefined> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    checkNotEmpty(instanceId, "instanceId");
    checkNotNull(items, "items");
    checkPositive(timeoutMs, "timeoutMs");

    const zone = nameFromSelfLink(zoneLink);
    const instance = await this.gateway.getInstance(projectId, zone, instanceId);
    const existing = instance.metadata ?? {};

    const operation = await this.gateway.setInstanceMetadata(projectId, zone, instanceId, {
      ...existing,
      items: mergeMetadataItems(items, existing.items),
    });
    return this.poller.waitForOperation(projectId, withZone(operation, zone), timeoutMs, {
      description: `set metadata on ${instanceId}`,
      ...options,
    });
  }

  // -- Instance templates --

  async getTemplate(projectId: string, templateName: string): Promise<InstanceTemplate> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(templateName, "templateName");
    return this.gateway.getInstanceTemplate(projectId, templateName);
  }

  async insertTemplate(projectId: string, template: InstanceTemplate): Promise<ComputeOperation> {
    checkNotEmpty(projectId, "projectId");
    checkNotNull(template, "template");
    return this.gateway.insertInstanceTemplate(projectId, template);
  }

  async deleteTemplate(projectId: string, templateName: string): Promise<ComputeOperation> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(templateName, "templateName");
    return this.gateway.deleteInstanceTemplate(projectId, templateName);
  }

  async getTemplates(projectId: string): Promise<InstanceTemplate[]> {
    checkNotEmpty(projectId, "projectId");
    return processResourceList(await this.gateway.listInstanceTemplates(projectId), undefined, byName);
  }

  // -- Snapshots --

  /**
   * Snapshot every disk of an instance and wait for all of them.
   * See SnapshotOrchestrator for the failure semantics.
   */
  createSnapshot(
    projectId: string,
    zoneLink: string,
    instanceId: string,
    timeoutMs: number,
    options?: SnapshotOptions
  ): Promise<DiskSnapshotResult[]> {
    return this.snapshots.createSnapshot(projectId, zoneLink, instanceId, timeoutMs, options);
  }

  createSnapshotForDisk(
    projectId: string,
    zoneName: string,
    diskName: string,
    timeoutMs: number,
    options?: WaitOptions
  ): Promise<OperationError | undefined> {
    return this.snapshots.createSnapshotForDisk(projectId, zoneName, diskName, timeoutMs, options);
  }

  /** Delete a snapshot. Does not wait for the operation. */
  async deleteSnapshot(projectId: string, snapshotName: string): Promise<ComputeOperation> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(snapshotName, "snapshotName");
    return this.gateway.deleteSnapshot(projectId, snapshotName);
  }

  /**
   * @returns The snapshot, or undefined when it does not exist
   */
  async getSnapshot(projectId: string, snapshotName: string): Promise<Snapshot | undefined> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(snapshotName, "snapshotName");
    try {
      return await this.gateway.getSnapshot(projectId, snapshotName);
    } catch (error) {
      if (error instanceof ComputeIoError && error.notFound) {
        return undefined;
      }
      throw error;
    }
  }

  // -- Operations --

  async getZoneOperation(projectId: string, zoneLink: string, operationId: string): Promise<ComputeOperation> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zoneLink, "zoneLink");
    checkNotEmpty(operationId, "operationId");
    return this.gateway.getZoneOperation(projectId, nameFromSelfLink(zoneLink), operationId);
  }

  /**
   * Block until the operation completes.
   *
   * @returns The error payload of the finished operation, if any
   * @throws OperationTimeoutError when it does not complete in time
   */
  waitForOperationCompletion(
    projectId: string,
    operationId: string,
    zoneLink: string,
    timeoutMs: number,
    options?: WaitOptions
  ): Promise<OperationError | undefined> {
    return this.poller.waitForCompletion(projectId, zoneLink, operationId, timeoutMs, options);
  }

  /** Same as waitForOperationCompletion, for an operation record. */
  waitForOperation(
    projectId: string,
    operation: ComputeOperation,
    timeoutMs: number,
    options?: WaitOptions
  ): Promise<OperationError | undefined> {
    checkArgument(operation !== null && operation !== undefined, "operation is required");
    return this.poller.waitForOperation(projectId, operation, timeoutMs, options);
  }
}

function equalsIgnoreCase(value: string | null | undefined, expected: string): boolean {
  return value !== null && value !== undefined && value.toLowerCase() === expected.toLowerCase();
}

function withZone(operation: ComputeOperation, zone: string): ComputeOperation {
  return operation.zone ? operation : { ...operation, zone };
}
