import { generatePolicyTemplate, renderPolicyTemplate } from "../policy/template.js";

export interface TemplateCommandOptions {
  ports?: string[];
  fqdns?: string[];
  print?: (line: string) => void;
}

/**
 * Print a CiliumNetworkPolicy skeleton as YAML.
 */
export function runTemplate(
  app: string,
  namespace: string,
  options: TemplateCommandOptions = {},
): number {
  const print = options.print ?? ((line: string) => console.log(line));
  const template = generatePolicyTemplate(app, namespace, options.ports, options.fqdns);
  print(renderPolicyTemplate(template).trimEnd());
  return 0;
}
