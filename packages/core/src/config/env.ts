export type ErrorDetail = "full" | "minimal";

const ERROR_DETAIL_MAP: Record<string, ErrorDetail> = {
  full: "full",
  minimal: "minimal",
};

export class InjectionConfig {
  /**
   * How much context resolution errors carry. `full` appends the list of
   * available binding keys; `minimal` keeps the single-line message.
   */
  static getErrorDetail(): ErrorDetail {
    const raw = process.env.LINCHPIN_ERROR_DETAIL?.toLowerCase() ?? "";
    const explicit = ERROR_DETAIL_MAP[raw];
    if (explicit) return explicit;
    return process.env.NODE_ENV === "production" ? "minimal" : "full";
  }

  static getDefaultModuleName(): string {
    const raw = process.env.LINCHPIN_MODULE_NAME?.trim();
    return raw ? raw : "module";
  }
}
