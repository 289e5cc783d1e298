/**
 * Compute Engine resource types.
 *
 * Aliases of the @google-cloud/compute protos, so the rest of the package does
 * not spell out the full namespace.
 */

import type { protos } from "@google-cloud/compute";

export type Instance = protos.google.cloud.compute.v1.IInstance;
export type AttachedDisk = protos.google.cloud.compute.v1.IAttachedDisk;
export type Metadata = protos.google.cloud.compute.v1.IMetadata;
export type Region = protos.google.cloud.compute.v1.IRegion;
export type Zone = protos.google.cloud.compute.v1.IZone;
export type MachineType = protos.google.cloud.compute.v1.IMachineType;
export type DiskType = protos.google.cloud.compute.v1.IDiskType;
export type Image = protos.google.cloud.compute.v1.IImage;
export type AcceleratorType = protos.google.cloud.compute.v1.IAcceleratorType;
export type Network = protos.google.cloud.compute.v1.INetwork;
export type Subnetwork = protos.google.cloud.compute.v1.ISubnetwork;
export type InstanceTemplate = protos.google.cloud.compute.v1.IInstanceTemplate;
export type Snapshot = protos.google.cloud.compute.v1.ISnapshot;

/**
 * Instance status values reported by the API.
 */
export type InstanceStatus =
  | "PROVISIONING"
  | "STAGING"
  | "RUNNING"
  | "STOPPING"
  | "STOPPED"
  | "SUSPENDING"
  | "SUSPENDED"
  | "REPAIRING"
  | "TERMINATED";
