import {
  defaultImporterConfig,
  resolveImporterConfig,
  validateImporterConfig
} from "../../src/application/import-dump/importer.config";

describe("importer config", () => {
  it("fills defaults and trims the path", () => {
    expect(resolveImporterConfig({ path: "  /dumps/a.txt " })).toEqual({
      path: "/dumps/a.txt",
      compressed: false,
      precision: "ns",
      consistency: "any",
      batchSize: 5000
    });
  });

  it("drops a blank path", () => {
    expect(resolveImporterConfig({ path: "" }).path).toBeUndefined();
  });

  it.each([0, 100001, 2.5])("rejects batchSize=%s", (batchSize) => {
    expect(() => validateImporterConfig({ ...defaultImporterConfig, batchSize })).toThrow(
      `batchSize=${String(batchSize)} is out of allowed range [1..100000]`
    );
  });
});
