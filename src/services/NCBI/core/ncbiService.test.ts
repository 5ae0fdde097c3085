import axios, {
  AxiosError,
  type AxiosAdapter,
  type InternalAxiosRequestConfig,
} from "axios";
import { describe, expect, it } from "vitest";
import { BaseErrorCode, EntrezError } from "../../../types-global/errors.js";
import { createEInfoRequest } from "../models/eInfo.js";
import { createESearchRequest } from "../models/eSearch.js";
import { RetMode } from "../models/retMode.js";
import { eInfo, eSearch } from "./ncbiService.js";

interface FakeReply {
  status: number;
  body: string;
}

const createFakeNcbi = (reply: FakeReply | Error) => {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      data: reply.body,
      status: reply.status,
      statusText: reply.status === 200 ? "OK" : "Error",
      headers: {},
      config,
    };
  };
  return { client: axios.create({ adapter }), calls };
};

const jsonReply = (body: unknown, status = 200): FakeReply => ({
  status,
  body: JSON.stringify(body),
});

const dbListBody = {
  header: { type: "einfo", version: "0.3" },
  einforesult: { dblist: ["pubmed", "protein", "nuccore"] },
};

const searchBody = {
  header: { type: "esearch", version: "0.3" },
  esearchresult: {
    count: "2",
    retmax: "2",
    retstart: "0",
    idlist: ["1", "2"],
    translationset: [],
    querytranslation: "asthma[All Fields]",
  },
};

describe("eInfo", () => {
  it("sends no parameters besides retmode for an empty request", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(dbListBody));

    const response = await eInfo(client, createEInfoRequest());

    expect(calls).toHaveLength(1);
    expect(calls[0]?.method).toBe("get");
    expect(calls[0]?.url).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/einfo.fcgi",
    );
    expect(calls[0]?.params).toEqual({ retmode: "json" });
    expect(response.einforesult).toEqual({
      dblist: ["pubmed", "protein", "nuccore"],
    });
  });

  it("defaults to listing databases when no request is given", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(dbListBody));

    await eInfo(client);

    expect(calls[0]?.params).toEqual({ retmode: "json" });
  });

  it("passes db and version and returns the database description", async () => {
    const { client, calls } = createFakeNcbi(
      jsonReply({
        header: { type: "einfo", version: "0.3" },
        einforesult: {
          dbinfo: [
            {
              dbname: "pubmed",
              menuname: "PubMed",
              count: "123",
              lastupdate: "2026/10/01 04:05",
              fieldlist: [
                { name: "ALL", fullname: "All Fields", istruncatable: "Y" },
              ],
              linklist: [
                { name: "pubmed_pubmed", menu: "Similar articles", dbto: "pubmed" },
              ],
            },
          ],
        },
      }),
    );

    const response = await eInfo(
      client,
      createEInfoRequest({ db: "pubmed", version: "2.0" }),
    );

    expect(calls[0]?.params).toEqual({
      db: "pubmed",
      version: "2.0",
      retmode: "json",
    });
    expect(response.einforesult).toMatchObject({
      dbinfo: [{ dbname: "pubmed", lastupdate: "2026/10/01 04:05" }],
    });
  });

  it("rejects a non-JSON return mode without calling the transport", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(dbListBody));

    const call = eInfo(client, createEInfoRequest({ retmode: RetMode.TEXT }));

    await expect(call).rejects.toBeInstanceOf(EntrezError);
    await expect(call).rejects.toMatchObject({
      code: BaseErrorCode.UNSUPPORTED_RETMODE,
      message:
        'Only the "json" return mode is supported for einfo; received "text".',
      details: { endpoint: "einfo", retmode: "text" },
    });
    expect(calls).toHaveLength(0);
  });
});

describe("eSearch", () => {
  it("serializes only the term and returns the UID list", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(searchBody));

    const response = await eSearch(
      client,
      createESearchRequest({ term: "asthma" }),
    );

    expect(calls[0]?.url).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi",
    );
    expect(calls[0]?.params).toEqual({ term: "asthma", retmode: "json" });
    expect(response.esearchresult.idlist).toEqual(["1", "2"]);
  });

  it("stringifies numeric parameters", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(searchBody));

    await eSearch(
      client,
      createESearchRequest({
        term: "asthma",
        db: "pubmed",
        retstart: 20,
        retmax: 10,
        usehistory: "y",
        datetype: "pdat",
        mindate: "2020/01/01",
        maxdate: "2020/12/31",
      }),
    );

    expect(calls[0]?.params).toEqual({
      term: "asthma",
      db: "pubmed",
      retstart: "20",
      retmax: "10",
      usehistory: "y",
      datetype: "pdat",
      mindate: "2020/01/01",
      maxdate: "2020/12/31",
      retmode: "json",
    });
  });

  it("accepts an explicit JSON return mode", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(searchBody));

    await eSearch(
      client,
      createESearchRequest({ term: "asthma", retmode: RetMode.JSON }),
    );

    expect(calls[0]?.params).toEqual({ term: "asthma", retmode: "json" });
  });

  it("rejects XML without calling the transport", async () => {
    const { client, calls } = createFakeNcbi(jsonReply(searchBody));

    await expect(
      eSearch(
        client,
        createESearchRequest({ term: "asthma", retmode: RetMode.XML }),
      ),
    ).rejects.toMatchObject({
      code: BaseErrorCode.UNSUPPORTED_RETMODE,
      details: { endpoint: "esearch", retmode: "xml" },
    });
    expect(calls).toHaveLength(0);
  });

  it.each([400, 404, 429, 500, 503])(
    "fails with the status for HTTP %i whatever the body",
    async (status) => {
      const { client } = createFakeNcbi(jsonReply(searchBody, status));

      await expect(
        eSearch(client, createESearchRequest({ term: "asthma" })),
      ).rejects.toMatchObject({
        code: BaseErrorCode.NCBI_HTTP_ERROR,
        details: { endpoint: "esearch", status, body: JSON.stringify(searchBody) },
      });
    },
  );

  it("carries the raw body of a failed response", async () => {
    const { client } = createFakeNcbi({ status: 502, body: "Bad Gateway" });

    await expect(
      eSearch(client, createESearchRequest({ term: "asthma" })),
    ).rejects.toMatchObject({
      message: "NCBI esearch request failed with HTTP 502",
      details: { status: 502, body: "Bad Gateway" },
    });
  });

  it("fails validation when required result fields are missing", async () => {
    const { client } = createFakeNcbi(
      jsonReply({ esearchresult: { count: "2", retmax: "2", retstart: "0" } }),
    );

    await expect(
      eSearch(client, createESearchRequest({ term: "asthma" })),
    ).rejects.toMatchObject({
      code: BaseErrorCode.VALIDATION_ERROR,
      message: "Invalid ESearchResponse: esearchresult.idlist: Required",
    });
  });

  it("fails validation when the body is not JSON", async () => {
    const { client } = createFakeNcbi({
      status: 200,
      body: "<eSearchResult></eSearchResult>",
    });

    await expect(
      eSearch(client, createESearchRequest({ term: "asthma" })),
    ).rejects.toMatchObject({
      code: BaseErrorCode.VALIDATION_ERROR,
      message: "NCBI esearch response is not valid JSON.",
    });
  });

  it("surfaces an error message reported inside the result", async () => {
    const { client } = createFakeNcbi(
      jsonReply({ esearchresult: { ERROR: "Invalid query" } }),
    );

    await expect(
      eSearch(client, createESearchRequest({ term: "asthma" })),
    ).rejects.toMatchObject({
      code: BaseErrorCode.NCBI_API_ERROR,
      message: "NCBI API Error: Invalid query",
      details: { endpoint: "esearch", ncbiErrors: ["Invalid query"] },
    });
  });

  it("returns a conforming result even when it carries an ERROR", async () => {
    const body = {
      esearchresult: {
        count: "0",
        retmax: "0",
        retstart: "0",
        idlist: [],
        ERROR: "Invalid query",
      },
    };
    const { client } = createFakeNcbi(jsonReply(body));

    const response = await eSearch(
      client,
      createESearchRequest({ term: "asthma" }),
    );

    expect(response).toEqual(body);
  });

  it("returns a count-only result for rettype=count", async () => {
    const { client, calls } = createFakeNcbi(
      jsonReply({ esearchresult: { count: "4521" } }),
    );

    const response = await eSearch(
      client,
      createESearchRequest({ term: "asthma", rettype: "count" }),
    );

    expect(calls[0]?.params).toEqual({
      term: "asthma",
      rettype: "count",
      retmode: "json",
    });
    expect(response.esearchresult).toEqual({ count: "4521" });
  });

  it("wraps a transport failure without a response", async () => {
    const { client } = createFakeNcbi(
      new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"),
    );

    const call = eSearch(client, createESearchRequest({ term: "asthma" }));

    await expect(call).rejects.toMatchObject({
      code: BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
      message: "NCBI request failed without a response: connect ECONNREFUSED",
      details: { axiosCode: "ECONNREFUSED" },
    });
  });
});
