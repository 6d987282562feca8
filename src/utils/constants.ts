export const ERROR_MESSAGES = {
    NO_ROOT: 'Could not determine the repository root. Pass --root or set ANDROID_BUILD_TOP.',
    NO_TARGETS: 'At least one target module is required.',
    MODULE_INFO_UNREADABLE: 'Cannot read module-info file.',
    MODULE_INFO_INVALID: 'Module-info file is not a JSON object.',
};

export const CONFIG = {
    CONFIG_FILE_NAME: '.modsrc.json',
    ROOT_ENV_VAR: 'ANDROID_BUILD_TOP',
    DEFAULT_MODULE_INFO: 'out/target/product/generic/module-info.json',
    DEFAULT_DEPTH: 0,
    DEFAULT_CONCURRENCY: 8,
    TEST_SEGMENTS: ['tests'],
    IGNORED_SOURCE_DIRS: ['libcore/ojluni/src/lambda/java'],
};

export const EXTENSIONS = {
    JAVA: '.java',
    JAR: '.jar',
    AAR: '.aar',
    SRCJAR: '.srcjar',
};

/** Class tag of modules that produce an application package. */
export const APPS_CLASS = 'APPS';
