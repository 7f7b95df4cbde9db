export const KLOG_PATHS = {
  /** Attachments live under <root>/media/YYYY/MM/DD/<index>/ */
  media: 'media',
  recordExtension: '.txt',
  /** Project-local configuration file, looked up in the working directory */
  localConfig: 'klog.config.json',
  /** Per-user configuration, relative to the home directory */
  userConfig: '.config/klog/config.json',
} as const;

export const KLOG_ENV = {
  config: 'KLOG_CONFIG',
  repo: 'KLOG_REPO',
} as const;
