import type { ResolvedTestbedConfig } from "./schema.js";

export const defaultConfig: ResolvedTestbedConfig = {
  setup: {
    repo_url: "https://github.com/keon/algorithms.git",
    directory: "",
    branch: "gemini-unit-tests",
    manifest: "requirements.txt",
    venv_dir: "venv",
    venv_command: "virtualenv",
    reuse_existing: true,
    retries: 2,
    retry_delay_ms: 1000,
    step_timeout_ms: 0,
    continue_on_error: false
  },
  container: {
    runtime: "docker",
    tag: "gemini-unit-test-gen",
    context: ".",
    dockerfile: "",
    gitconfig_path: "~/.gitconfig",
    gitconfig_target: "/etc/gitconfig",
    workdir: "/chat",
    shell: "bash"
  },
  env: {
    pass_through: []
  }
};
