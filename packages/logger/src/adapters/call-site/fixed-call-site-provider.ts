import type { CallSite, CallSiteProvider, LogEntryPoint } from "../../ports/call-site"

/** Reports the same location for every call. */
export class FixedCallSiteProvider implements CallSiteProvider {
  private site: CallSite

  constructor(site: Partial<CallSite> & Pick<CallSite, "file">) {
    this.site = { line: 1, column: 1, thread: "main", ...site }
  }

  set(site: Partial<CallSite>): void {
    this.site = { ...this.site, ...site }
  }

  capture(_boundary: LogEntryPoint): CallSite {
    return { ...this.site }
  }
}
