export class RunnerError extends Error {
  readonly node?: string;

  constructor(message: string, node?: string) {
    super(message);
    this.name = 'RunnerError';
    this.node = node;
  }
}

export const RunnerErrors = {
  unknownNode: (node: string) => new RunnerError(`Unknown node: \`${node}\``, node),
  undefinedPayload: (node: string, payload: string) =>
    new RunnerError(`Undefined payload: \`${payload}\` in node: \`${node}\``, node),
  undefinedNetwork: (node: string, network: string) =>
    new RunnerError(`Undefined network: \`${network}\` in node: \`${node}\``, node),
};
