import { parseArgs, runRequest } from "../src/cli";
import { ApiRequestDispatcher } from "../src/api/ApiRequestDispatcher";
import { RequestMethod } from "../src/api/types";
import { InMemoryHttpClient } from "../src/http/InMemoryHttpClient";
import { InMemoryReachabilityProbe } from "../src/network/InMemoryReachabilityProbe";
import { StaticTokenProvider } from "../src/auth/StaticTokenProvider";
import { InMemoryLogger } from "../src/logging";

describe("parseArgs", () => {
  it("parses a GET request", () => {
    const result = parseArgs(["node", "cli.ts", "GET", "http://x/ok"]);

    expect(result).toEqual({
      method: RequestMethod.GET,
      url: "http://x/ok",
      payload: undefined,
      includeToken: true,
      configPath: undefined,
      verbose: false,
    });
  });

  it("accepts lowercase methods", () => {
    expect(parseArgs(["node", "cli.ts", "put", "http://x/1", "--data", "{}"]).method).toBe(RequestMethod.PUT);
  });

  it("parses --data as JSON", () => {
    const result = parseArgs(["node", "cli.ts", "POST", "http://x/create", "--data", '{"name":"a"}']);

    expect(result.payload).toEqual({ name: "a" });
  });

  it("parses flags", () => {
    const result = parseArgs([
      "node", "cli.ts", "GET", "http://x/ok", "--no-token", "--verbose", "--config", "/etc/api.json",
    ]);

    expect(result.includeToken).toBe(false);
    expect(result.verbose).toBe(true);
    expect(result.configPath).toBe("/etc/api.json");
  });

  it("rejects an unsupported method", () => {
    expect(() => parseArgs(["node", "cli.ts", "DELETE", "http://x/1"])).toThrow("Unsupported method: DELETE");
  });

  it("rejects a missing URL", () => {
    expect(() => parseArgs(["node", "cli.ts", "GET"])).toThrow("Expected a method and a URL");
  });

  it("rejects POST without --data", () => {
    expect(() => parseArgs(["node", "cli.ts", "POST", "http://x/create"])).toThrow("POST requires non-null --data");
  });

  it("rejects an empty URL", () => {
    expect(() => parseArgs(["node", "cli.ts", "GET", ""])).toThrow("URL must not be empty");
  });

  it("rejects null data for POST and PUT", () => {
    expect(() => parseArgs(["node", "cli.ts", "POST", "http://x/create", "--data", "null"])).toThrow(
      "POST requires non-null --data"
    );
    expect(() => parseArgs(["node", "cli.ts", "PUT", "http://x/1", "--data", "null"])).toThrow(
      "PUT requires non-null --data"
    );
  });

  it("reports options given without a value", () => {
    expect(() => parseArgs(["node", "cli.ts", "POST", "http://x/create", "--data"])).toThrow(
      "--data requires a value"
    );
    expect(() => parseArgs(["node", "cli.ts", "GET", "http://x/ok", "--config"])).toThrow(
      "--config requires a value"
    );
  });

  it("rejects invalid JSON data", () => {
    expect(() => parseArgs(["node", "cli.ts", "POST", "http://x/create", "--data", "{oops"])).toThrow(
      "--data is not valid JSON: {oops"
    );
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["node", "cli.ts", "GET", "http://x/ok", "--retry"])).toThrow("Unknown option: --retry");
  });
});

describe("runRequest", () => {
  let http: InMemoryHttpClient;
  let dispatcher: ApiRequestDispatcher;

  beforeEach(() => {
    http = new InMemoryHttpClient();
    dispatcher = new ApiRequestDispatcher(
      http,
      new InMemoryReachabilityProbe(true),
      new StaticTokenProvider("test-token"),
      new InMemoryLogger()
    );
  });

  it("prints the serialized response and exits 0 on success", async () => {
    http.enqueueJson({ a: 1 });
    const output: string[] = [];

    const code = await runRequest(
      dispatcher,
      parseArgs(["node", "cli.ts", "GET", "http://x/ok"]),
      (text) => output.push(text)
    );

    expect(code).toBe(0);
    expect(output).toEqual([
      '{\n  "Response_Status": "SUCCESS",\n  "Response_Data": {\n    "a": 1\n  }\n}\n',
    ]);
  });

  it("exits 1 on failure", async () => {
    http.enqueueJson({ message: "not found" }, 404);
    const output: string[] = [];

    const code = await runRequest(
      dispatcher,
      parseArgs(["node", "cli.ts", "POST", "http://x/create", "--data", '{"name":"a"}', "--no-token"]),
      (text) => output.push(text)
    );

    expect(code).toBe(1);
    expect(JSON.parse(output[0])).toEqual({
      Response_Status: "FAILED",
      Response_Data: { message: "not found" },
      Response_Exception: "not found",
    });
    expect(http.getRequests()[0].headers.Authorization).toBeUndefined();
  });
});
