/**
 * Deployment configuration tests: compose services and the image build workflow
 */

import { describe, it, expect } from '@jest/globals';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { load } from 'js-yaml';
import { formatImageReference } from '../../../src/lib/image-tag';

const ROOT = join(__dirname, '..', '..', '..');

type YamlMap = Record<string, unknown>;

function isMap(value: unknown): value is YamlMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadYaml(file: string): YamlMap {
  const document: unknown = load(readFileSync(join(ROOT, file), 'utf8'));
  if (!isMap(document)) {
    throw new Error(`${file} is not a YAML mapping`);
  }
  return document;
}

function mapAt(value: unknown, ...path: string[]): YamlMap {
  let current = value;
  for (const key of path) {
    current = isMap(current) ? current[key] : undefined;
  }
  if (!isMap(current)) {
    throw new Error(`No mapping at ${path.join('.')}`);
  }
  return current;
}

/** Compose `KEY=value` environment entries as a map; bare keys pass through from the host */
function environmentOf(service: YamlMap): Map<string, string | undefined> {
  const entries = Array.isArray(service.environment) ? service.environment : [];
  return new Map(
    entries.map((entry): [string, string | undefined] => {
      const text = String(entry);
      const separator = text.indexOf('=');
      return separator === -1 ? [text, undefined] : [text.slice(0, separator), text.slice(separator + 1)];
    }),
  );
}

describe('docker-compose.yml', () => {
  const services = mapAt(loadYaml('docker-compose.yml'), 'services');
  const mcp = mapAt(services, 'teradata-mcp-server');
  const rest = mapAt(services, 'teradata-rest-server');

  it('should serve streamable HTTP on container port 8001', () => {
    expect(Object.fromEntries(environmentOf(mcp))).toEqual({
      DATABASE_URI: '${DATABASE_URI}',
      MCP_TRANSPORT: 'streamable-http',
      MCP_PATH: '/mcp/',
      MCP_HOST: '0.0.0.0',
      MCP_PORT: '8001',
    });
    expect(mcp.ports).toEqual(['${PORT:-8001}:8001']);
  });

  it('should start the REST proxy only under the rest profile', () => {
    expect(rest.profiles).toEqual(['rest']);
    expect(mcp.profiles).toBeUndefined();
    expect(rest.ports).toEqual(['8002:8002']);
    expect(Object.fromEntries(environmentOf(rest))).toEqual({
      DATABASE_URI: '${DATABASE_URI}',
      MCP_TRANSPORT: 'stdio',
      MCPO_API_KEY: undefined,
    });
  });

  it('should put mcpo in front of the stdio server', () => {
    expect(rest.entrypoint).toBe(
      `sh -c 'export MCP_TRANSPORT=stdio && mcpo --port 8002 --api-key "$MCPO_API_KEY" -- node dist/src/cli/cli.js'`,
    );
    expect(mcp.entrypoint).toBeUndefined();
  });

  it('should build both services from the same image', () => {
    expect(mcp.build).toBe('.');
    expect(rest.build).toBe('.');
    expect(mcp.image).toBe('teradata-mcp-server:latest');
    expect(rest.image).toBe(mcp.image);
  });
});

describe('Dockerfile', () => {
  const lines = readFileSync(join(ROOT, 'Dockerfile'), 'utf8').split('\n');

  it('should install mcpo on the runtime PATH', () => {
    expect(lines).toContain('  && /opt/mcpo/bin/pip install --no-cache-dir mcpo');
    expect(lines).toContain('ENV PATH="/opt/mcpo/bin:${PATH}"');
  });

  it('should start the compiled CLI by default', () => {
    expect(lines).toContain('CMD ["node", "dist/src/cli/cli.js"]');
  });
});

describe('.github/workflows/build.yml', () => {
  const workflow = loadYaml('.github/workflows/build.yml');
  const job = mapAt(workflow, 'jobs', 'build');
  const steps = Array.isArray(job.steps) ? job.steps.filter(isMap) : [];

  it('should be callable with the build inputs and secrets', () => {
    const call = mapAt(workflow, 'on', 'workflow_call');

    expect(Object.keys(mapAt(call, 'inputs'))).toEqual(['branch', 'ecr_url', 'ecr_repo', 'label']);
    expect(Object.keys(mapAt(call, 'secrets'))).toEqual(['aws_access_key_id', 'aws_secret_access_key']);
    expect(job['runs-on']).toEqual(['${{ inputs.label }}']);
  });

  it('should push exactly one 1.0.<run number> tag for linux/amd64', () => {
    const build = steps.find((step) => String(step.uses).startsWith('docker/build-push-action'));
    const options = mapAt(build, 'with');

    expect(options).toMatchObject({
      push: true,
      platforms: 'linux/amd64',
      file: './Dockerfile',
      context: '.',
      builder: 'default',
      tags: '${{ inputs.ecr_url }}/${{ inputs.ecr_repo }}:1.0.${{ github.run_number }}',
    });
  });

  it('should render the tag the same way as formatImageReference', () => {
    const build = steps.find((step) => String(step.uses).startsWith('docker/build-push-action'));
    const template = String(mapAt(build, 'with').tags);

    const rendered = template
      .replace('${{ inputs.ecr_url }}', '123456789012.dkr.ecr.ap-northeast-1.amazonaws.com')
      .replace('${{ inputs.ecr_repo }}', 'teradata-mcp-server')
      .replace('${{ github.run_number }}', '57');

    expect(rendered).toBe(
      formatImageReference('123456789012.dkr.ecr.ap-northeast-1.amazonaws.com', 'teradata-mcp-server', 57),
    );
  });
});
