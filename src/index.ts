#!/usr/bin/env tsx

import { registerCommand, routeCommand } from "./cli";
import { budgetCommand } from "./cli/commands/budget";
import { processCommand } from "./cli/commands/process";

// Register commands
registerCommand("process", processCommand);
registerCommand("budget", budgetCommand);

// Route CLI command
const args = process.argv.slice(2);
await routeCommand(args);
