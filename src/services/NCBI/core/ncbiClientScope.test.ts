import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import http from "http";
import { afterEach, describe, expect, expectTypeOf, it, vi } from "vitest";
import { createESearchRequest } from "../models/eSearch.js";
import {
  buildIdentificationHeaders,
  type NcbiClientOptions,
  withNcbiClient,
} from "./ncbiClientScope.js";
import { eSearch } from "./ncbiService.js";

const searchBody = JSON.stringify({
  esearchresult: {
    count: "1",
    retmax: "1",
    retstart: "0",
    idlist: ["42"],
  },
});

const recordingAdapter = () => {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    return { data: searchBody, status: 200, statusText: "OK", headers: {}, config };
  };
  return { adapter, calls };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildIdentificationHeaders", () => {
  it("overrides the configured tool and email", () => {
    expect(
      buildIdentificationHeaders({ tool: "test-tool", email: "test@example.org" }),
    ).toEqual({ tool: "test-tool", email: "test@example.org" });
  });
});

describe("withNcbiClient", () => {
  it("sends the identification headers with every request", async () => {
    const { adapter, calls } = recordingAdapter();

    const response = await withNcbiClient(
      (client) => eSearch(client, createESearchRequest({ term: "asthma" })),
      { tool: "test-tool", email: "test@example.org", axiosConfig: { adapter } },
    );

    expect(response.esearchresult.idlist).toEqual(["42"]);
    expect(calls[0]?.headers.tool).toBe("test-tool");
    expect(calls[0]?.headers.email).toBe("test@example.org");
  });

  it("adds the API key to the query string", async () => {
    const { adapter, calls } = recordingAdapter();

    await withNcbiClient(
      (client) => eSearch(client, createESearchRequest({ term: "asthma" })),
      { apiKey: "test-key", axiosConfig: { adapter } },
    );

    expect(calls[0]?.params).toEqual({
      term: "asthma",
      retmode: "json",
      api_key: "test-key",
    });
  });

  it("sets no timeout unless one is given", async () => {
    const timeouts = await Promise.all([
      withNcbiClient(async (client) => client.defaults.timeout),
      withNcbiClient(async (client) => client.defaults.timeout, {
        timeout: 5_000,
      }),
    ]);

    expect(timeouts).toEqual([0, 5_000]);
  });

  it("does not accept axios defaults that each request overrides", () => {
    type AxiosDefaults = NonNullable<NcbiClientOptions["axiosConfig"]>;

    expectTypeOf<AxiosDefaults>().not.toHaveProperty("validateStatus");
    expectTypeOf<AxiosDefaults>().not.toHaveProperty("responseType");
    expectTypeOf<AxiosDefaults>().toHaveProperty("adapter");
  });

  it("releases its agents after the callback resolves", async () => {
    // https.Agent inherits destroy from http.Agent.
    const destroy = vi.spyOn(http.Agent.prototype, "destroy");

    await expect(withNcbiClient(async () => "done")).resolves.toBe("done");

    expect(destroy).toHaveBeenCalledTimes(2);
  });

  it("releases its agents and rethrows when the callback rejects", async () => {
    // https.Agent inherits destroy from http.Agent.
    const destroy = vi.spyOn(http.Agent.prototype, "destroy");
    const failure = new Error("callback failed");

    await expect(
      withNcbiClient(async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(destroy).toHaveBeenCalledTimes(2);
  });
});
