import { describe, test, expect } from "vitest";
import { discoverArtifacts, partitionArtifacts } from "./discovery";
import { createMockFileSystem } from "#/test-utils/mocks";
import { DiscoveryError } from "#/errors";
import type { Artifact } from "./artifact.types";

describe("discoverArtifacts", () => {
  test("classifies child folders in listing order", () => {
    const fs = createMockFileSystem({
      "/repo/Development/Sales.Report/definition.pbir": "{}",
      "/repo/Development/Sales.SemanticModel/definition.pbism": "{}",
      "/repo/Development/Nightly.Pipeline/pipeline-content.json": "{}",
    });

    const artifacts = discoverArtifacts(fs, "/repo");

    expect(artifacts).toEqual([
      {
        displayName: "Sales",
        type: "Report",
        folderName: "Sales.Report",
        sourcePath: "/repo/Development/Sales.Report",
        definitionPath: "/repo/Development/Sales.Report/definition.pbir",
      },
      {
        displayName: "Sales",
        type: "SemanticModel",
        folderName: "Sales.SemanticModel",
        sourcePath: "/repo/Development/Sales.SemanticModel",
        definitionPath: "/repo/Development/Sales.SemanticModel/definition.pbism",
      },
      {
        displayName: "Nightly.Pipeline",
        type: "Unknown",
        folderName: "Nightly.Pipeline",
        sourcePath: "/repo/Development/Nightly.Pipeline",
        definitionPath: null,
      },
    ]);
  });

  test("ignores plain files in the source folder", () => {
    const fs = createMockFileSystem({
      "/repo/Development/README.md": "# readme",
      "/repo/Development/Bronze.Lakehouse/lakehouse.metadata.json": "{}",
    });

    const artifacts = discoverArtifacts(fs, "/repo");

    expect(artifacts.map((a) => a.folderName)).toEqual(["Bronze.Lakehouse"]);
  });

  test("records a null definition path when the file is missing", () => {
    const fs = createMockFileSystem({ "/repo/Development/Exec.Dashboard/.platform": "{}" });

    const [dashboard] = discoverArtifacts(fs, "/repo");

    expect(dashboard?.definitionPath).toBeNull();
  });

  test("skips entries that cannot be stat'ed", () => {
    const fs = createMockFileSystem({
      "/repo/Development/Sales.Report/definition.pbir": "{}",
      "/repo/Development/Broken.Notebook/notebook-content.py": "",
    });
    const stat = fs.stat;
    fs.stat = (path) => {
      if (path === "/repo/Development/Broken.Notebook") {
        throw new Error("ENOENT: no such file or directory, stat '/repo/Development/Broken.Notebook'");
      }
      return stat(path);
    };

    const artifacts = discoverArtifacts(fs, "/repo");

    expect(artifacts.map((a) => a.folderName)).toEqual(["Sales.Report"]);
  });

  test("scans a custom source folder", () => {
    const fs = createMockFileSystem({ "/repo/items/Ingest.Dataflow/mashup.pq": "let x = 1 in x" });

    const artifacts = discoverArtifacts(fs, "/repo", "items");

    expect(artifacts.map((a) => a.type)).toEqual(["Dataflow"]);
  });

  test("returns an empty list for an empty folder", () => {
    const fs = createMockFileSystem();
    fs.mkdir("/repo/Development");

    expect(discoverArtifacts(fs, "/repo")).toEqual([]);
  });

  test("throws DiscoveryError when the source folder is missing", () => {
    const fs = createMockFileSystem({ "/repo/Other/Sales.Report/definition.pbir": "{}" });

    expect(() => discoverArtifacts(fs, "/repo")).toThrow(DiscoveryError);
    expect(() => discoverArtifacts(fs, "/repo")).toThrow("Source folder not found: /repo/Development");
  });
});

describe("partitionArtifacts", () => {
  const artifact = (folderName: string, type: Artifact["type"]): Artifact => ({
    displayName: folderName,
    type,
    folderName,
    sourcePath: `/repo/Development/${folderName}`,
    definitionPath: null,
  });

  test("excludes Unknown artifacts", () => {
    const report = artifact("Sales.Report", "Report");
    const pipeline = artifact("Nightly.Pipeline", "Unknown");

    const { eligible, excluded } = partitionArtifacts([report, pipeline]);

    expect(eligible).toEqual([report]);
    expect(excluded).toEqual([{ folderName: "Nightly.Pipeline", type: "Unknown", reason: "unknown-type" }]);
  });

  test("excludes types outside the filter", () => {
    const report = artifact("Sales.Report", "Report");
    const notebook = artifact("Clean.Notebook", "Notebook");

    const { eligible, excluded } = partitionArtifacts([report, notebook], ["Notebook"]);

    expect(eligible).toEqual([notebook]);
    expect(excluded).toEqual([{ folderName: "Sales.Report", type: "Report", reason: "filtered" }]);
  });
});
