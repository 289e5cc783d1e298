import { ComputeIoError } from "@computekit/compute-common";
import { GcpResourceGateway, toComputeOperation } from "./gcp-resource-gateway";

// ── Mock SDK imports ───────────────────────────────────────────────────

jest.mock("@google-cloud/compute", () => ({
  InstancesClient: jest.fn(),
  DisksClient: jest.fn(),
  ZoneOperationsClient: jest.fn(),
  RegionsClient: jest.fn(),
  ZonesClient: jest.fn(),
  MachineTypesClient: jest.fn(),
  DiskTypesClient: jest.fn(),
  ImagesClient: jest.fn(),
  AcceleratorTypesClient: jest.fn(),
  NetworksClient: jest.fn(),
  SubnetworksClient: jest.fn(),
  InstanceTemplatesClient: jest.fn(),
  SnapshotsClient: jest.fn(),
}));

// ── Test helpers ───────────────────────────────────────────────────────

function createGateway() {
  const clients = {
    instances: {
      get: jest.fn(),
      insert: jest.fn(),
      delete: jest.fn(),
      setMetadata: jest.fn(),
      aggregatedListAsync: jest.fn(),
    },
    disks: { createSnapshot: jest.fn() },
    zoneOperations: { get: jest.fn() },
    regions: { list: jest.fn() },
    zones: { list: jest.fn(), get: jest.fn() },
    machineTypes: { list: jest.fn() },
    diskTypes: { list: jest.fn() },
    images: { list: jest.fn(), get: jest.fn() },
    acceleratorTypes: { list: jest.fn() },
    networks: { list: jest.fn() },
    subnetworks: { list: jest.fn() },
    instanceTemplates: { get: jest.fn(), insert: jest.fn(), delete: jest.fn(), list: jest.fn() },
    snapshots: { get: jest.fn(), delete: jest.fn() },
  };
  const log = jest.fn();
  const gateway = new GcpResourceGateway(clients as never, log);
  return { gateway, clients, log };
}

function lroHandle(name: string, status = "RUNNING", zone?: string) {
  return { name, latestResponse: { name, status, zone } };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("GcpResourceGateway", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("reads", () => {
    it("unwraps the first element of list responses", async () => {
      const { gateway, clients } = createGateway();
      clients.regions.list.mockResolvedValue([[{ name: "us-east1" }], null, {}]);

      await expect(gateway.listRegions("test-project")).resolves.toEqual([{ name: "us-east1" }]);
      expect(clients.regions.list).toHaveBeenCalledWith({ project: "test-project" });
    });

    it("passes the region to subnetwork listing", async () => {
      const { gateway, clients } = createGateway();
      clients.subnetworks.list.mockResolvedValue([[]]);

      await gateway.listSubnetworks("test-project", "us-central1");

      expect(clients.subnetworks.list).toHaveBeenCalledWith({ project: "test-project", region: "us-central1" });
    });

    it("logs each remote call at debug level", async () => {
      const { gateway, clients, log } = createGateway();
      clients.zones.get.mockResolvedValue([{ name: "us-central1-a" }]);

      await gateway.getZone("test-project", "us-central1-a");

      expect(log).toHaveBeenCalledWith("compute: get zone us-central1-a", "debug");
    });

    it("returns the raw operation record from zone operation lookups", async () => {
      const { gateway, clients } = createGateway();
      clients.zoneOperations.get.mockResolvedValue([{ name: "op-1", status: "DONE" }]);

      await expect(gateway.getZoneOperation("test-project", "us-central1-a", "op-1")).resolves.toEqual({
        name: "op-1",
        status: "DONE",
      });
      expect(clients.zoneOperations.get).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        operation: "op-1",
      });
    });
  });

  describe("aggregatedListInstances", () => {
    it("keeps only scopes that hold instances", async () => {
      const { gateway, clients } = createGateway();
      clients.instances.aggregatedListAsync.mockImplementation(async function* () {
        yield ["zones/us-central1-a", { instances: [{ name: "vm-1" }] }];
        yield ["zones/us-central1-b", { warning: { code: "NO_RESULTS_ON_PAGE" } }];
        yield ["zones/europe-west1-b", { instances: [{ name: "vm-2" }, { name: "vm-3" }] }];
      });

      const byScope = await gateway.aggregatedListInstances("test-project", '(labels.env = "dev")');

      expect([...byScope.keys()]).toEqual(["zones/us-central1-a", "zones/europe-west1-b"]);
      expect(byScope.get("zones/europe-west1-b")).toEqual([{ name: "vm-2" }, { name: "vm-3" }]);
      expect(clients.instances.aggregatedListAsync).toHaveBeenCalledWith({
        project: "test-project",
        filter: '(labels.env = "dev")',
      });
    });
  });

  describe("mutations", () => {
    it("returns the operation of an instance insert, defaulting its zone", async () => {
      const { gateway, clients } = createGateway();
      clients.instances.insert.mockResolvedValue([lroHandle("op-insert")]);

      const operation = await gateway.insertInstance("test-project", "us-central1-a", { name: "vm-1" });

      expect(operation).toEqual({ name: "op-insert", zone: "us-central1-a", status: "RUNNING", error: null });
      expect(clients.instances.insert).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        instanceResource: { name: "vm-1" },
      });
    });

    it("sends the template link as sourceInstanceTemplate", async () => {
      const { gateway, clients } = createGateway();
      clients.instances.insert.mockResolvedValue([lroHandle("op-insert")]);

      await gateway.insertInstanceWithTemplate(
        "test-project",
        "us-central1-a",
        { name: "vm-1" },
        "global/instanceTemplates/tpl-1"
      );

      expect(clients.instances.insert).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        instanceResource: { name: "vm-1" },
        sourceInstanceTemplate: "global/instanceTemplates/tpl-1",
      });
    });

    it("requests a snapshot of the disk", async () => {
      const { gateway, clients } = createGateway();
      clients.disks.createSnapshot.mockResolvedValue([lroHandle("op-snap", "PENDING", "zones/us-central1-a")]);

      const operation = await gateway.createDiskSnapshot("test-project", "us-central1-a", "d1", { name: "d1" });

      expect(operation.zone).toBe("zones/us-central1-a");
      expect(clients.disks.createSnapshot).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        disk: "d1",
        snapshotResource: { name: "d1" },
      });
    });

    it("sends metadata as metadataResource", async () => {
      const { gateway, clients } = createGateway();
      clients.instances.setMetadata.mockResolvedValue([lroHandle("op-meta")]);
      const metadata = { fingerprint: "abc", items: [{ key: "k", value: "v" }] };

      await gateway.setInstanceMetadata("test-project", "us-central1-a", "vm-1", metadata);

      expect(clients.instances.setMetadata).toHaveBeenCalledWith({
        project: "test-project",
        zone: "us-central1-a",
        instance: "vm-1",
        metadataResource: metadata,
      });
    });

    it("leaves the zone unset for global operations", async () => {
      const { gateway, clients } = createGateway();
      clients.instanceTemplates.delete.mockResolvedValue([lroHandle("op-del")]);

      const operation = await gateway.deleteInstanceTemplate("test-project", "tpl-1");

      expect(operation.zone).toBeNull();
      expect(clients.instanceTemplates.delete).toHaveBeenCalledWith({
        project: "test-project",
        instanceTemplate: "tpl-1",
      });
    });
  });

  describe("error handling", () => {
    it("wraps SDK failures with the call context", async () => {
      const { gateway, clients } = createGateway();
      const cause = new Error("ECONNRESET");
      clients.zoneOperations.get.mockRejectedValue(cause);

      const error = await gateway.getZoneOperation("test-project", "us-central1-a", "op-1").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ComputeIoError);
      expect(error).toMatchObject({
        message: "Failed to get operation op-1: ECONNRESET",
        notFound: false,
        cause,
      });
    });

    it("flags missing resources", async () => {
      const { gateway, clients } = createGateway();
      clients.snapshots.get.mockRejectedValue(Object.assign(new Error("5 NOT_FOUND: snap-1"), { code: 5 }));

      await expect(gateway.getSnapshot("test-project", "snap-1")).rejects.toMatchObject({ notFound: true });
    });

    it("fails when a mutation returns no operation name", async () => {
      const { gateway, clients } = createGateway();
      clients.instances.delete.mockResolvedValue([{ latestResponse: {} }]);

      await expect(gateway.deleteInstance("test-project", "us-central1-a", "vm-1")).rejects.toThrow(
        "Remote call returned no operation name"
      );
    });
  });
});

describe("toComputeOperation", () => {
  it("prefers the record in latestResponse", () => {
    expect(
      toComputeOperation({ name: "op-1", latestResponse: { name: "op-1", status: "DONE", zone: "zones/z1" } })
    ).toEqual({ name: "op-1", zone: "zones/z1", status: "DONE", error: null });
  });

  it("falls back to the handle when there is no latestResponse", () => {
    expect(toComputeOperation({ name: "op-2", status: 2 }, "us-central1-a")).toEqual({
      name: "op-2",
      zone: "us-central1-a",
      status: 2,
      error: null,
    });
  });

  it("takes the name from the handle when the record lacks one", () => {
    expect(toComputeOperation({ name: "op-3", latestResponse: { status: "PENDING" } })).toMatchObject({
      name: "op-3",
      status: "PENDING",
    });
  });

  it.each([undefined, null, "op", {}])("rejects %p", (handle) => {
    expect(() => toComputeOperation(handle)).toThrow(ComputeIoError);
  });
});
