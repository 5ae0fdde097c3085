/**
 * @fileoverview Manual invocation: prints the EInfo record for PubMed.
 * Run with `npm run example`.
 */

import {
  createEInfoRequest,
  eInfo,
  isEInfoDbList,
  withNcbiClient,
} from "../src/index.js";

const response = await withNcbiClient((client) =>
  eInfo(client, createEInfoRequest({ db: "pubmed", version: "2.0" })),
);

if (isEInfoDbList(response.einforesult)) {
  console.log(response.einforesult.dblist.join("\n"));
} else {
  for (const info of response.einforesult.dbinfo) {
    console.log(
      `${info.dbname}: ${info.count ?? "?"} records, last updated ${info.lastupdate}`,
    );
    console.log(`  ${info.fieldlist.length} fields, ${info.linklist.length} links`);
  }
}
