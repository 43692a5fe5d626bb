export const ADVANCED_PATH_MARKER = '-advanced'

export const isAdvancedOperationPath = (path: string) => path.includes(ADVANCED_PATH_MARKER)
