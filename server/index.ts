import { createServerRuntime } from "./runtime/kernel.js";

const runtime = await createServerRuntime().catch((error: unknown) => {
  console.error("[startup] failed to initialize", error);
  process.exit(1);
});

await runtime.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    console.log(`[shutdown] received ${signal}`);
    runtime.stop();
  });
}
