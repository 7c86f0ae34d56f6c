import { FetchHttpClient } from "../../src/http/FetchHttpClient";
import { RequestMethod } from "../../src/api/types";

describe("FetchHttpClient", () => {
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns status and body text", async () => {
    fetchSpy.mockResolvedValue(new Response('{"a":1}', { status: 201 }));
    const client = new FetchHttpClient();

    const response = await client.send({ method: RequestMethod.GET, url: "http://x/ok", headers: {} });

    expect(response.status).toBe(201);
    expect(response.ok).toBe(true);
    expect(await response.text()).toBe('{"a":1}');
  });

  it("passes method, headers and body to fetch", async () => {
    fetchSpy.mockResolvedValue(new Response("{}", { status: 200 }));
    const client = new FetchHttpClient();
    const headers = { "Content-type": "application/json" };

    await client.send({ method: RequestMethod.POST, url: "http://x/create", headers, body: '{"name":"a"}' });

    expect(fetchSpy).toHaveBeenCalledWith(
      "http://x/create",
      expect.objectContaining({ method: "POST", headers, body: '{"name":"a"}' })
    );
  });

  it("reports non-2xx statuses without throwing", async () => {
    fetchSpy.mockResolvedValue(new Response('{"message":"nope"}', { status: 404 }));
    const client = new FetchHttpClient();

    const response = await client.send({ method: RequestMethod.GET, url: "http://x/missing", headers: {} });

    expect(response.ok).toBe(false);
    expect(response.status).toBe(404);
  });

  it("aborts when the timeout expires", async () => {
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const err = new Error("This operation was aborted");
            err.name = "AbortError";
            reject(err);
          });
        })
    );
    const client = new FetchHttpClient();

    await expect(
      client.send({ method: RequestMethod.GET, url: "http://x/slow", headers: {}, timeoutMs: 10 })
    ).rejects.toMatchObject({ name: "AbortError" });
  });

  it("propagates transport errors", async () => {
    fetchSpy.mockRejectedValue(new TypeError("fetch failed"));
    const client = new FetchHttpClient();

    await expect(
      client.send({ method: RequestMethod.GET, url: "http://x/down", headers: {} })
    ).rejects.toThrow("fetch failed");
  });
});
