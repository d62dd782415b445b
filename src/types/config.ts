/** Full tool configuration (config.yaml). */
export interface HardeningConfig {
  privilege: {
    require_root: boolean;
  };
  errors: {
    command_timeout_ceiling: number;
  };
  sshd: {
    main_config: string;
    dropin_dir: string;
    dropin_path: string;
    backup_dir: string;
    kex_algorithms: string[];
    macs: string[];
    host_key_algorithms: string[];
  };
  rpcbind: {
    package: string;
    units: string[];
    port: number;
  };
  ip_forward: {
    key: string;
    desired: string;
    conf_path: string;
  };
  profiles: {
    disabled: string[];
  };
}
