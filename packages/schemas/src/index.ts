// Lifecycle types
export * from "./command.js";
export * from "./lifecycle.js";

// Configuration
export * from "./config.js";

// Remote resources
export * from "./content.js";
