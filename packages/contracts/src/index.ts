export * from "./schema/labeler_config_v1";
export * from "./schema/printed_ledger_v1";
export * from "./schema/label_payload_v1";
