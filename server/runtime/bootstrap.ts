import type { TempJanitor } from "../archive/tempJanitor.js";

export interface RuntimeBootstrapDependencies {
  enableJanitor: boolean;
  ensureStorageLayout: () => Promise<void>;
  janitor: TempJanitor;
}

export interface RuntimeBootstrapHandle {
  dispose: () => void;
}

export async function initializeRuntimeBootstrap(
  deps: RuntimeBootstrapDependencies
): Promise<RuntimeBootstrapHandle> {
  await deps.ensureStorageLayout();

  let janitorRunning = false;
  if (deps.enableJanitor) {
    await deps.janitor.start();
    janitorRunning = true;
  }

  return {
    dispose: () => {
      if (!janitorRunning) {
        return;
      }

      deps.janitor.dispose();
      janitorRunning = false;
    }
  };
}
