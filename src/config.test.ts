import { describe, expect, it } from "vitest";
import { DEFAULT_ROOT_URL, loadConfig } from "./config";

describe("loadConfig", () => {
  it("requires a merchant id", () => {
    expect(() => loadConfig({})).toThrow("Invalid environment variables: MERCHANT_ID");
  });

  it("rejects a blank merchant id", () => {
    expect(() => loadConfig({ MERCHANT_ID: "   " })).toThrow("MERCHANT_ID");
  });

  it("fills in defaults", () => {
    const config = loadConfig({ MERCHANT_ID: "1234567" });
    expect(config).toEqual({
      merchantId: "1234567",
      homepage: "",
      rootUrl: DEFAULT_ROOT_URL,
      keyPath: "./gsa-key.json",
      applicationName: "structured-content-samples-1.0",
      bugReportDir: process.cwd(),
      debug: false,
    });
  });

  it("adds a trailing slash to the root url", () => {
    const config = loadConfig({ MERCHANT_ID: "1", CONTENT_API_ROOT_URL: "http://localhost:8080/content/v1" });
    expect(config.rootUrl).toBe("http://localhost:8080/content/v1/");
  });

  it("rejects a root url that is not a url", () => {
    expect(() => loadConfig({ MERCHANT_ID: "1", CONTENT_API_ROOT_URL: "content/v1" })).toThrow("CONTENT_API_ROOT_URL");
  });

  it("turns DEBUG=1 into the debug flag", () => {
    expect(loadConfig({ MERCHANT_ID: "1", DEBUG: "1" }).debug).toBe(true);
    expect(loadConfig({ MERCHANT_ID: "1", DEBUG: "yes" }).debug).toBe(false);
  });

  it("keeps homepage and bug report dir when given", () => {
    const config = loadConfig({ MERCHANT_ID: "1", HOMEPAGE: "http://shop.example/", BUG_REPORT_DIR: "/tmp/reports" });
    expect(config.homepage).toBe("http://shop.example/");
    expect(config.bugReportDir).toBe("/tmp/reports");
  });
});
