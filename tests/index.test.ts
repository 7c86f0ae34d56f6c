import * as engine from "../src";

describe("package entry", () => {
  it("exposes the dispatcher and its collaborators", () => {
    expect(typeof engine.ApiRequestDispatcher).toBe("function");
    expect(typeof engine.createApiEngine).toBe("function");
    expect(typeof engine.resolveConfig).toBe("function");
    expect(engine.RequestMethod.POST).toBe("POST");
    expect(engine.ResponseStatus.FAILED).toBe("FAILED");
  });
});
