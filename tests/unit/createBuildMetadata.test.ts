import {
  createBuildMetadata,
  InvalidBuildMetadataError
} from "../../src/core/build-metadata/createBuildMetadata";
import type { NewBuildMetadata } from "../../src/core/build-metadata/buildMetadata.types";

const build = { buildId: "build-1", partitionId: 100, projectId: "project-1" };

describe("createBuildMetadata", () => {
  it("starts with an unresolved timeout and assigns a uuid", () => {
    const doc = createBuildMetadata({ build });

    expect(doc).toEqual({
      _id: expect.any(String),
      buildId: "build-1",
      partitionId: 100,
      projectId: "project-1",
      timeoutSource: "unknown"
    });
    expect(doc._id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(doc).not.toHaveProperty("timeout");
  });

  it("keeps an explicit project over the build's project", () => {
    expect(createBuildMetadata({ build, projectId: "project-2" }).projectId).toBe("project-2");
  });

  it("falls back to the build's project when the explicit one is blank", () => {
    expect(createBuildMetadata({ build, projectId: "  " }).projectId).toBe("project-1");
  });

  it("copies optional flags and config", () => {
    const doc = createBuildMetadata({
      build,
      interruptible: false,
      hasExposedArtifacts: true,
      configOptions: { manualConfirmation: "Sure?" },
      configVariables: [{ key: "A", value: "1" }]
    });

    expect(doc.interruptible).toBe(false);
    expect(doc.hasExposedArtifacts).toBe(true);
    expect(doc.configOptions).toEqual({ manualConfirmation: "Sure?" });
    expect(doc.configVariables).toEqual([{ key: "A", value: "1" }]);
  });

  it("throws InvalidBuildMetadataError when the build is missing", () => {
    const input = { build: null } as unknown as NewBuildMetadata;
    expect(() => createBuildMetadata(input)).toThrow(
      new InvalidBuildMetadataError("Invalid build metadata: missing build")
    );
  });

  it("rejects empty build ids", () => {
    expect(() => createBuildMetadata({ build: { ...build, buildId: " " } })).toThrow(
      new InvalidBuildMetadataError("Invalid build metadata: buildId is empty")
    );
  });

  it.each([-1, 1.5, Number.NaN])("rejects partitionId %p", (partitionId) => {
    expect(() => createBuildMetadata({ build: { ...build, partitionId } })).toThrow(
      new InvalidBuildMetadataError("Invalid build metadata: partitionId must be a non-negative integer")
    );
  });

  it("rejects a build without any project", () => {
    expect(() => createBuildMetadata({ build: { ...build, projectId: "" } })).toThrow(
      new InvalidBuildMetadataError("Invalid build metadata: missing projectId")
    );
  });
});
