import { homedir } from "os";
import { join } from "path";

// Local config
export const AVAIL_DIR = join(homedir(), ".savail");
export const CONFIG_FILE = join(AVAIL_DIR, "config.toml");

// Lines of a rejected --parsable2 attempt echoed in the fallback warning
export const FALLBACK_SNIPPET_LINES = 3;
