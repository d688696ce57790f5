export { registerCommand, routeCommand, type CommandHandler } from "./router";
export { printAlerts } from "./alerts";
export { loadStatement, parseStatementArgs, type StatementArgs } from "./load";
