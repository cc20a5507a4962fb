// Run by librespot (--onevent) once per player event.
import { buildHookRequest } from "./hook-request.js";

async function main(): Promise<void> {
  const request = buildHookRequest(process.env);
  if (!request) {
    return;
  }

  const response = await fetch(request.url, request.init);
  if (!response.ok) {
    throw new Error(`Player event hook rejected with status ${response.status}`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
