// Commands Module Index
// Re-exports all command registration functions

export { registerAskCommands } from "./ask";
export { registerChatCommands } from "./chat";
export { registerInitCommands } from "./init";
export { registerToolsCommands } from "./tools";
