export interface ResolvedSetupConfig {
  repo_url: string;
  directory: string;
  branch: string;
  manifest: string;
  venv_dir: string;
  venv_command: string;
  reuse_existing: boolean;
  retries: number;
  retry_delay_ms: number;
  step_timeout_ms: number;
  continue_on_error: boolean;
}

export interface ResolvedContainerConfig {
  runtime: string;
  tag: string;
  context: string;
  dockerfile: string;
  gitconfig_path: string;
  gitconfig_target: string;
  workdir: string;
  shell: string;
}

export interface ResolvedTestbedConfig {
  setup: ResolvedSetupConfig;
  container: ResolvedContainerConfig;
  env: {
    pass_through: string[];
  };
}
