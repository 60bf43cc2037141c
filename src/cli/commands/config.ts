/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils/load-config";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to override harvest settings.");
  console.log("See src/config/default.json for available options.");
  console.log(
    "\nAPI credentials are read from API_KEY_1/CX_1, API_KEY_2/CX_2, ... (or API_KEY/CX),",
  );
  console.log("either in the environment or in a .env file.");
}
