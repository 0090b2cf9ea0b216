import { describe, test, expect } from "vitest";
import { definitionCandidates, resolveDefinitionFile } from "./definition";
import { createMockFileSystem } from "#/test-utils/mocks";

describe("definitionCandidates", () => {
  test("uses the canonical file for each type", () => {
    expect(definitionCandidates("Report", "Sales")).toEqual(["definition.pbir"]);
    expect(definitionCandidates("SemanticModel", "Sales")).toEqual(["definition.pbism"]);
    expect(definitionCandidates("Lakehouse", "Bronze")).toEqual(["lakehouse.metadata.json"]);
    expect(definitionCandidates("Dataflow", "Ingest")).toEqual(["mashup.pq"]);
  });

  test("notebooks fall back to a Jupyter file named after the notebook", () => {
    expect(definitionCandidates("Notebook", "Clean")).toEqual(["notebook-content.py", "Clean.ipynb"]);
  });

  test("dashboards and unknown folders have none", () => {
    expect(definitionCandidates("Dashboard", "Exec")).toEqual([]);
    expect(definitionCandidates("Unknown", "scratch")).toEqual([]);
  });
});

describe("resolveDefinitionFile", () => {
  test("returns the canonical file when present", () => {
    const fs = createMockFileSystem({
      "/src/Clean.Notebook/notebook-content.py": "print(1)",
      "/src/Clean.Notebook/Clean.ipynb": "{}",
    });

    expect(resolveDefinitionFile(fs, "/src/Clean.Notebook", "Notebook", "Clean")).toBe(
      "/src/Clean.Notebook/notebook-content.py"
    );
  });

  test("falls back to the .ipynb file", () => {
    const fs = createMockFileSystem({ "/src/Clean.Notebook/Clean.ipynb": "{}" });

    expect(resolveDefinitionFile(fs, "/src/Clean.Notebook", "Notebook", "Clean")).toBe(
      "/src/Clean.Notebook/Clean.ipynb"
    );
  });

  test("returns null when nothing matches", () => {
    const fs = createMockFileSystem({ "/src/Sales.Report/report.json": "{}" });

    expect(resolveDefinitionFile(fs, "/src/Sales.Report", "Report", "Sales")).toBeNull();
  });

  test("ignores a directory with the definition file's name", () => {
    const fs = createMockFileSystem({ "/src/Sales.Report/definition.pbir/nested.txt": "x" });

    expect(resolveDefinitionFile(fs, "/src/Sales.Report", "Report", "Sales")).toBeNull();
  });
});
