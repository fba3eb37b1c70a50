import path from "path";
import { getLogger, relativeModuleName } from "./Logger";

describe("#Logger", () => {
  describe("#relativeModuleName", () => {
    it("should name a module by its path below the source root", () => {
      const fileName = path.resolve(__dirname, "..", "engine", "DiagonalSums.ts");

      expect(relativeModuleName(fileName)).toBe("engine/DiagonalSums.ts");
    });
  });

  describe("#getLogger", () => {
    it("should hand out one logger per module", () => {
      expect(getLogger(module)).toBe(getLogger(module));
    });

    it("should fall back to a shared logger without a module", () => {
      expect(getLogger()).toBe(getLogger());
      expect(getLogger()).not.toBe(getLogger(module));
    });

    it("should stay silent under test", () => {
      expect(getLogger(module).silent).toBe(true);
    });
  });
});
