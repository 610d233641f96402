export const runKeys = {
  lock: (runId: string) => `run:${runId}:lock`,
  transcript: (runId: string) => `run:${runId}:transcript`,
  notify: (runId: string) => `run:${runId}:notify`,
  control: (runId: string) => `run:${runId}:control`,
  instanceControl: (runId: string, instanceId: string) => `run:${runId}:control:${instanceId}`,
  liveness: (instanceId: string, runId: string) => `instance:${instanceId}:run:${runId}`,
  health: (instanceId: string) => `instance:${instanceId}:health`
};

export const NEW_DATA = "new";
