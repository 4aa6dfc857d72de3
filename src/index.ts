export * from "./logger";
export * from "./errors";
export * from "./health";
export * from "./clock";
export * from "./instance";
export * from "./registry_store";
export * from "./heartbeat";
export * from "./registration_api";
export * from "./query_api";
export * from "./transport";
export * from "./in_memory_transport";
export * from "./zeromq_transport";
export * from "./registry_protocol";
export * from "./registry_server";
export * from "./registry_client";
export * from "./load_balancer";
export * from "./route";
export * from "./forwarder";
export * from "./http_forwarder";
export * from "./router";
export * from "./gateway_app";
export * from "./config";
export * from "./create_node";
