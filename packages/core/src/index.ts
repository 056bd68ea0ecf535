// Ledger operation surface
export * as Registry from "./media_registry";
export * as Host from "./ledger_host";

// Ledger internals
export * as Archive from "./archive_store";
export * as Access from "./access_matrix";
export * as Sequence from "./sequence_generator";
export * as Transaction from "./ledger_transaction";
export * as Store from "./record_store";

// Type system exports
export * as Records from "./types";
export * as Errors from "./errors";
export * as Validation from "./validation";
export * as Factories from "./factories";
export * as Schemas from "./record_schemas";

// Infrastructure
export * as Config from "./config_manager";
export * as Session from "./session_manager";
export * as EventBus from "./event_bus";
export * as Logger from "./logger";
