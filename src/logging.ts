import debug from 'debug';

export const NAMESPACES = {
  dice: {
    parser: 'chronicle:dice:parser',
    roller: 'chronicle:dice:roller'
  },
  log: {
    session: 'chronicle:log:session'
  },
  context: {
    assembler: 'chronicle:context:assembler',
    estimator: 'chronicle:context:estimator',
    renderer: 'chronicle:context:renderer'
  },
  storage: {
    json: 'chronicle:storage:json',
    sqlite: 'chronicle:storage:sqlite',
    factory: 'chronicle:storage:factory'
  },
  generation: {
    tools: 'chronicle:generation:tools',
    turn: 'chronicle:generation:turn'
  },
  config: 'chronicle:config'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Apply the namespaces listed in configuration unless DEBUG is already set
 * in the environment, which always wins.
 */
export function enableNamespaces(namespaces?: string): void {
  if (process.env.DEBUG) return;
  if (namespaces && namespaces.trim().length > 0) {
    debug.enable(namespaces);
  }
}
