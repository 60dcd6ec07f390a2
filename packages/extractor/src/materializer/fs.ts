import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

/** Create the destination's parent directory if needed */
export async function ensureParentDir(destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
}
