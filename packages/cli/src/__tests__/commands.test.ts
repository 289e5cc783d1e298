import chalk from "chalk";
import ora from "ora";
import { ComputeIoError } from "@computekit/compute-common";
import { ComputeClient } from "@computekit/compute-gcp";
import type { IOperationPoller, ISnapshotOrchestrator } from "@computekit/compute-gcp";
import {
  appendMetadata,
  listDiskTypes,
  listInstances,
  listRegions,
  listZones,
  snapshot,
  waitForOperation,
} from "../commands";
import type { CommandContext } from "../commands";
import type { CliOptions } from "../options";

// ── Test helpers ───────────────────────────────────────────────────────

function createContext(overrides: Partial<CliOptions> = {}) {
  const gateway = {
    listRegions: jest.fn(),
    listZones: jest.fn(),
    listDiskTypes: jest.fn(),
    getInstance: jest.fn(),
    setInstanceMetadata: jest.fn(),
    aggregatedListInstances: jest.fn(),
  };
  const poller: jest.Mocked<IOperationPoller> = {
    waitForCompletion: jest.fn().mockResolvedValue(undefined),
    waitForOperation: jest.fn().mockResolvedValue(undefined),
  };
  const snapshots: jest.Mocked<ISnapshotOrchestrator> = {
    createSnapshot: jest.fn().mockResolvedValue([]),
    createSnapshotForDisk: jest.fn(),
  };
  const lines: string[] = [];
  const log = jest.fn();
  const ctx: CommandContext = {
    client: new ComputeClient(gateway as never, poller, snapshots),
    options: { project: "test-project", zone: "us-central1-a", timeoutMs: 60_000, verbose: false, ...overrides },
    log,
    print: (line) => lines.push(line),
    progress: (text) => ora({ text, isSilent: true }).start(),
  };
  return { ctx, gateway, poller, snapshots, lines, log };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("commands", () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  describe("listRegions", () => {
    it("prints region names with their description", async () => {
      const { ctx, gateway, lines } = createContext();
      gateway.listRegions.mockResolvedValue([{ name: "us-east1", description: "South Carolina" }, { name: "asia-east1" }]);

      await listRegions(ctx);

      expect(lines).toEqual(["asia-east1", "us-east1 South Carolina"]);
    });

    it("says so when there is nothing to list", async () => {
      const { ctx, gateway, lines } = createContext();
      gateway.listRegions.mockResolvedValue([]);

      await listRegions(ctx);

      expect(lines).toEqual(["No regions found"]);
    });
  });

  describe("listZones", () => {
    it("matches zones against the expanded region link", async () => {
      const { ctx, gateway, lines } = createContext();
      gateway.listZones.mockResolvedValue([
        { name: "us-central1-a", region: "https://www.googleapis.com/compute/v1/projects/test-project/regions/us-central1" },
        { name: "us-east1-b", region: "https://www.googleapis.com/compute/v1/projects/test-project/regions/us-east1" },
      ]);

      await listZones(ctx, "us-central1");

      expect(lines).toEqual(["us-central1-a"]);
    });
  });

  describe("listDiskTypes", () => {
    it("lists only boot disk types with --boot", async () => {
      const { ctx, gateway, lines } = createContext();
      gateway.listDiskTypes.mockResolvedValue([{ name: "pd-ssd" }, { name: "local-ssd" }]);

      await listDiskTypes(ctx, { boot: true });

      expect(lines).toEqual(["pd-ssd"]);
    });

    it("needs a zone", async () => {
      const { ctx, gateway } = createContext({ zone: undefined });

      await expect(listDiskTypes(ctx, {})).rejects.toThrow("--zone or COMPUTEKIT_ZONE is required");
      expect(gateway.listDiskTypes).not.toHaveBeenCalled();
    });
  });

  describe("listInstances", () => {
    it("filters by labels and prints name, zone and status", async () => {
      const { ctx, gateway, lines } = createContext();
      gateway.aggregatedListInstances.mockResolvedValue(
        new Map([
          [
            "zones/us-central1-a",
            [{ name: "vm-1", zone: "https://www.googleapis.com/compute/v1/projects/test-project/zones/us-central1-a", status: "RUNNING" }],
          ],
        ])
      );

      await listInstances(ctx, { label: ["env=dev"] });

      expect(gateway.aggregatedListInstances).toHaveBeenCalledWith("test-project", '(labels.env = "dev")');
      expect(lines).toEqual(["vm-1 us-central1-a RUNNING"]);
    });
  });

  describe("snapshot", () => {
    it("prints one line per disk and reports payload errors", async () => {
      const { ctx, snapshots, lines, log } = createContext();
      snapshots.createSnapshot.mockResolvedValue([
        { diskName: "d1" },
        { diskName: "d2", error: { errors: [{ code: "QUOTA_EXCEEDED", message: "too many snapshots" }] } },
      ]);

      await expect(snapshot(ctx, "vm-1", { cancelSiblings: true })).resolves.toBe(false);

      expect(snapshots.createSnapshot).toHaveBeenCalledWith("test-project", "us-central1-a", "vm-1", 60_000, {
        log,
        cancelSiblingsOnFailure: true,
      });
      expect(lines).toEqual(["d1 ok", "d2 QUOTA_EXCEEDED: too many snapshots"]);
    });

    it("rethrows failures", async () => {
      const { ctx, snapshots } = createContext();
      snapshots.createSnapshot.mockRejectedValue(new ComputeIoError("Failed to get instance vm-1: NOT_FOUND"));

      await expect(snapshot(ctx, "vm-1", {})).rejects.toThrow("Failed to get instance vm-1: NOT_FOUND");
    });
  });

  describe("appendMetadata", () => {
    it("appends the parsed entries using the configured timeout", async () => {
      const { ctx, gateway, poller } = createContext({ timeoutMs: 90_000 });
      gateway.getInstance.mockResolvedValue({ name: "vm-1", metadata: { fingerprint: "fp-1" } });
      gateway.setInstanceMetadata.mockResolvedValue({ name: "op-meta", zone: "us-central1-a" });

      await expect(appendMetadata(ctx, "vm-1", ["role=web", "tier=1"])).resolves.toBe(true);

      expect(gateway.setInstanceMetadata).toHaveBeenCalledWith("test-project", "us-central1-a", "vm-1", {
        fingerprint: "fp-1",
        items: [
          { key: "role", value: "web" },
          { key: "tier", value: "1" },
        ],
      });
      expect(poller.waitForOperation.mock.calls[0]?.[2]).toBe(90_000);
    });

    it("rejects malformed entries before touching the instance", async () => {
      const { ctx, gateway } = createContext();

      await expect(appendMetadata(ctx, "vm-1", ["role"])).rejects.toThrow('Expected key=value, got "role"');
      expect(gateway.getInstance).not.toHaveBeenCalled();
    });
  });

  describe("waitForOperation", () => {
    it("succeeds when the operation finishes cleanly", async () => {
      const { ctx, poller } = createContext();

      await expect(waitForOperation(ctx, "op-1")).resolves.toBe(true);
      expect(poller.waitForCompletion).toHaveBeenCalledWith("test-project", "us-central1-a", "op-1", 60_000, {
        log: ctx.log,
      });
    });

    it("reports an operation that finished with errors", async () => {
      const { ctx, poller } = createContext();
      poller.waitForCompletion.mockResolvedValue({ errors: [{ message: "disk busy" }] });

      await expect(waitForOperation(ctx, "op-1")).resolves.toBe(false);
    });
  });
});
