import { ensureNotBlank } from "../utils.js";

export type InBodyTarget = Readonly<{ kind: "inbody" }>;
export type ZipTarget = Readonly<{ kind: "zip" }>;
export type PutTarget = Readonly<{ kind: "put"; url: string }>;

/** Where the service delivers the converted output. */
export type Target = InBodyTarget | ZipTarget | PutTarget;

const IN_BODY: InBodyTarget = Object.freeze({ kind: "inbody" });
const ZIP: ZipTarget = Object.freeze({ kind: "zip" });

export const Targets = {
  inBody: (): InBodyTarget => IN_BODY,
  zip: (): ZipTarget => ZIP,
  put: (url: string): PutTarget =>
    Object.freeze({ kind: "put", url: ensureNotBlank(url, "PutTarget.url") }),
};
