/**
 * Resource Gateway Interface
 *
 * The remote Compute API as seen by computekit: plain list/get/insert/delete
 * calls with no state of their own. Every method fails with ComputeIoError.
 * Zone and region arguments are short names, never self links.
 */

import type { ComputeOperation } from "@computekit/compute-common";
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
} from "../../types";

export interface IResourceGateway {
  // -- Locations --

  listRegions(project: string): Promise<Region[]>;
  listZones(project: string): Promise<Zone[]>;
  getZone(project: string, zone: string): Promise<Zone>;

  // -- Catalog --

  listMachineTypes(project: string, zone: string): Promise<MachineType[]>;
  listDiskTypes(project: string, zone: string): Promise<DiskType[]>;
  listImages(project: string): Promise<Image[]>;
  getImage(project: string, image: string): Promise<Image>;
  listAcceleratorTypes(project: string, zone: string): Promise<AcceleratorType[]>;

  // -- Networking --

  listNetworks(project: string): Promise<Network[]>;
  listSubnetworks(project: string, region: string): Promise<Subnetwork[]>;

  // -- Instances --

  getInstance(project: string, zone: string, instance: string): Promise<Instance>;
  insertInstance(project: string, zone: string, instance: Instance): Promise<ComputeOperation>;
  insertInstanceWithTemplate(
    project: string,
    zone: string,
    instance: Instance,
    templateLink: string
  ): Promise<ComputeOperation>;
  deleteInstance(project: string, zone: string, instance: string): Promise<ComputeOperation>;
  /** Instances matching the filter, keyed by zone scope (e.g. "zones/us-central1-a"). */
  aggregatedListInstances(project: string, filter: string): Promise<Map<string, Instance[]>>;
  setInstanceMetadata(
    project: string,
    zone: string,
    instance: string,
    metadata: Metadata
  ): Promise<ComputeOperation>;

  // -- Instance templates --

  getInstanceTemplate(project: string, name: string): Promise<InstanceTemplate>;
  insertInstanceTemplate(project: string, template: InstanceTemplate): Promise<ComputeOperation>;
  deleteInstanceTemplate(project: string, name: string): Promise<ComputeOperation>;
  listInstanceTemplates(project: string): Promise<InstanceTemplate[]>;

  // -- Snapshots --

  createDiskSnapshot(
    project: string,
    zone: string,
    disk: string,
    snapshot: Snapshot
  ): Promise<ComputeOperation>;
  getSnapshot(project: string, name: string): Promise<Snapshot>;
  deleteSnapshot(project: string, name: string): Promise<ComputeOperation>;

  // -- Operations --

  getZoneOperation(project: string, zone: string, operation: string): Promise<ComputeOperation>;
}
