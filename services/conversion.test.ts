import path from "node:path";
import { needsRasterizing, PdftoppmRasterizer } from "./conversion";
import { makeTempDir, removeDir } from "./testing";

describe("needsRasterizing", () => {
  it("should only rasterize PDF documents", () => {
    expect(needsRasterizing(".PDF")).toBe(true);
    expect(needsRasterizing(".jpg")).toBe(false);
  });
});

describe("PdftoppmRasterizer", () => {
  it("should reject when the executable cannot be started", async () => {
    const root = await makeTempDir();
    const rasterizer = new PdftoppmRasterizer({
      executable: path.join(root, "no-such-pdftoppm"),
    });

    try {
      await expect(
        rasterizer.rasterize(path.join(root, "statement.pdf"), root)
      ).rejects.toMatchObject({ code: "ENOENT" });
    } finally {
      await removeDir(root);
    }
  });
});
