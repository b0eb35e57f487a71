/**
 * Shared constants for depsource.
 * Single source of truth for directory names, file names and defaults.
 */

export const DIR_PATTERNS = {
  DEPSOURCE_HOME: '.depsource',
  SOURCES_CACHE: 'sources.cache'
} as const;

export const FILE_PATTERNS = {
  SOURCES_LIST_EXT: '.list',
  CACHE_INDEX: 'index',
  DEFAULT_SOURCES_LIST: '20-default.list',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  DMG_EXT: '.dmg'
} as const;

/** System-wide sources list location, overridable via DEPSOURCE_SOURCES_LIST_DIR */
export const SYSTEM_SOURCES_LIST_DIR = '/etc/depsource/sources.list.d';

export const ENV_VARS = {
  HOME: 'DEPSOURCE_HOME',
  SOURCES_LIST_DIR: 'DEPSOURCE_SOURCES_LIST_DIR',
  DISTRO: 'DEPSOURCE_DISTRO',
  VERBOSE: 'DEPSOURCE_VERBOSE'
} as const;

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 15_000;
export const DEFAULT_UPDATE_CONCURRENCY = 4;

export const DEFAULT_SOURCES_LIST_URL =
  'https://raw.githubusercontent.com/ros/rosdistro/master/rosdep/sources.list.d/20-default.list';

export const DEFAULT_GBPDISTRO_TARGETS_URL =
  'https://raw.githubusercontent.com/ros/rosdistro/master/releases/targets.yaml';

/** First line of the cache index */
export const CACHE_INDEX_HEADER = "#autogenerated by depsource, do not edit. use 'depsource update' instead";

/** View name of the aggregate view over every loaded source */
export const ALL_VIEW_KEY = 'sources.list';

export const SOURCE_INSTALLER = 'source';
export const SOURCE_INSTALL_COMMAND = 'depsource';
