import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod/v4';
import type { Logger } from 'pino';

import { actionableErrorFields, asMenderApiError, type MenderApiError, ValidationError } from '../errors.js';
import type { MenderClient } from '../mender/client.js';
import { redactForLog } from '../security/redaction.js';
import {
  artifactIdArgsSchema,
  DEPLOYMENT_STATUSES,
  DEVICE_STATUSES,
  deploymentDeviceLogArgsSchema,
  deploymentIdArgsSchema,
  deviceIdArgsSchema,
  listAuditLogsArgsSchema,
  listDeploymentsArgsSchema,
  listDevicesArgsSchema,
  listInventoryArgsSchema,
  listReleasesArgsSchema,
  releaseNameArgsSchema,
  validateArgs
} from '../security/validation.js';

export interface ServerDependencies {
  logger: Logger;
  client: MenderClient;
}

const SERVER_VERSION = '1.0.0';
const READ_ONLY = { readOnlyHint: true, openWorldHint: true } as const;

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function successResult(data: unknown) {
  const structuredContent: Record<string, unknown> = {
    result: data
  };
  return {
    content: [
      {
        type: 'text' as const,
        text: toJsonText(data)
      }
    ],
    structuredContent
  };
}

function errorPayload(error: MenderApiError) {
  return {
    code: error.code,
    message: error.message,
    ...(error.statusCode === undefined ? {} : { statusCode: error.statusCode }),
    ...actionableErrorFields(error.code),
    ...(error.details === undefined ? {} : { details: error.details })
  };
}

function errorResult(error: MenderApiError) {
  const payload = errorPayload(error);
  return {
    isError: true,
    content: [
      {
        type: 'text' as const,
        text: toJsonText({
          error: payload
        })
      }
    ],
    structuredContent: {
      error: payload
    }
  };
}

export function templateVariable(variables: Record<string, string | string[]>, name: string): string {
  const value = variables[name];
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) {
    return '';
  }
  try {
    return decodeURIComponent(first);
  } catch {
    throw new ValidationError(name, 'encoding', `Input validation failed for '${name}': malformed percent-encoding`);
  }
}

const limitInput = (max: number, fallback: number) =>
  z
    .number()
    .optional()
    .describe(`Maximum number of items to return (1-${max}, default ${fallback}).`);

const skipInput = z.number().optional().describe('Number of items to skip; converted to a page number.');
const deviceIdInput = z.string().describe('Mender device ID.');
const deploymentIdInput = z.string().describe('Mender deployment ID.');

export function buildMcpServer(deps: ServerDependencies): McpServer {
  const { client, logger } = deps;

  const server = new McpServer(
    {
      name: 'mcp-mender',
      version: SERVER_VERSION,
      websiteUrl: 'https://docs.mender.io/api'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  async function runRead<T>(tool: string, fn: () => Promise<T>) {
    const started = Date.now();
    try {
      const data = await fn();
      logger.debug({ tool, durationMs: Date.now() - started }, 'Tool call succeeded');
      return successResult(data);
    } catch (error) {
      const mapped = asMenderApiError(error);
      logger.warn(
        {
          tool,
          code: mapped.code,
          statusCode: mapped.statusCode,
          details: redactForLog(mapped.details),
          durationMs: Date.now() - started
        },
        'Tool call failed'
      );
      return errorResult(mapped);
    }
  }

  async function readJsonResource(uri: URL, fn: () => Promise<unknown>) {
    let body: unknown;
    try {
      body = await fn();
    } catch (error) {
      const mapped = asMenderApiError(error);
      logger.warn({ uri: uri.href, code: mapped.code, statusCode: mapped.statusCode }, 'Resource read failed');
      body = { error: errorPayload(mapped) };
    }

    return {
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: toJsonText(body)
        }
      ]
    };
  }

  server.registerTool(
    'mender.health.get',
    {
      description: 'Check connectivity and authentication against the configured Mender server.',
      annotations: READ_ONLY
    },
    async () => {
      return runRead('mender.health.get', async () => {
        const sample = await client.getDevices({ limit: 1 });
        return {
          ...client.getServerInfo(),
          reachable: true,
          sampleDeviceCount: sample.length,
          checkedAt: new Date().toISOString()
        };
      });
    }
  );

  server.registerTool(
    'mender.devices.list',
    {
      description: 'List devices, optionally filtered by authentication status and device type.',
      inputSchema: {
        status: z
          .string()
          .optional()
          .describe(`Device status filter: ${DEVICE_STATUSES.join(', ')}.`),
        device_type: z.string().optional().describe('Device type filter, e.g. raspberrypi4.'),
        limit: limitInput(500, 20),
        skip: skipInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.devices.list', async () => {
        const { status, device_type: deviceType, limit, skip } = validateArgs(listDevicesArgsSchema, args);
        return client.getDevices({ status, deviceType, limit, skip });
      });
    }
  );

  server.registerTool(
    'mender.devices.get',
    {
      description: 'Get the details and current status of one device.',
      inputSchema: {
        device_id: deviceIdInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.devices.get', async () => {
        const { device_id: deviceId } = validateArgs(deviceIdArgsSchema, args);
        return client.getDevice(deviceId);
      });
    }
  );

  server.registerTool(
    'mender.deployments.list',
    {
      description: 'List deployments, optionally filtered by status.',
      inputSchema: {
        status: z
          .string()
          .optional()
          .describe(`Deployment status filter: ${DEPLOYMENT_STATUSES.join(', ')}.`),
        limit: limitInput(100, 10),
        skip: skipInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.deployments.list', async () => {
        const { status, limit, skip } = validateArgs(listDeploymentsArgsSchema, args);
        return client.getDeployments({ status, limit, skip });
      });
    }
  );

  server.registerTool(
    'mender.deployments.get',
    {
      description: 'Get one deployment with its per-status device statistics.',
      inputSchema: {
        deployment_id: deploymentIdInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.deployments.get', async () => {
        const { deployment_id: deploymentId } = validateArgs(deploymentIdArgsSchema, args);
        return client.getDeployment(deploymentId);
      });
    }
  );

  server.registerTool(
    'mender.artifacts.list',
    {
      description: 'List uploaded artifacts.',
      annotations: READ_ONLY
    },
    async () => {
      return runRead('mender.artifacts.list', async () => client.getArtifacts());
    }
  );

  server.registerTool(
    'mender.artifacts.get',
    {
      description: 'Get one artifact by ID, including its compatible device types.',
      inputSchema: {
        artifact_id: z.string().describe('Mender artifact ID.')
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.artifacts.get', async () => {
        const { artifact_id: artifactId } = validateArgs(artifactIdArgsSchema, args);
        return client.getArtifact(artifactId);
      });
    }
  );

  server.registerTool(
    'mender.releases.list',
    {
      description: 'List releases, optionally filtered by a name or tag substring.',
      inputSchema: {
        name: z.string().optional().describe('Case-insensitive substring of the release name.'),
        tag: z.string().optional().describe('Case-insensitive substring of a tag key or value.'),
        limit: limitInput(100, 20)
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.releases.list', async () => {
        const { name, tag, limit } = validateArgs(listReleasesArgsSchema, args);
        return client.getReleases({ name, tag, limit });
      });
    }
  );

  server.registerTool(
    'mender.releases.get',
    {
      description: 'Get one release by name, including its artifacts and tags.',
      inputSchema: {
        release_name: z.string().describe('Exact release name.')
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.releases.get', async () => {
        const { release_name: releaseName } = validateArgs(releaseNameArgsSchema, args);
        return client.getRelease(releaseName);
      });
    }
  );

  server.registerTool(
    'mender.inventory.get',
    {
      description: 'Get the inventory attributes and group of one device.',
      inputSchema: {
        device_id: deviceIdInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.inventory.get', async () => {
        const { device_id: deviceId } = validateArgs(deviceIdArgsSchema, args);
        const inventory = await client.getDeviceInventory(deviceId);
        const group = await client.getDeviceGroup(deviceId);
        return { ...inventory, group };
      });
    }
  );

  server.registerTool(
    'mender.inventory.list',
    {
      description: 'List inventory for many devices, optionally only devices that report an attribute.',
      inputSchema: {
        limit: limitInput(500, 20),
        has_attribute: z.string().optional().describe('Only devices reporting this attribute name.')
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.inventory.list', async () => {
        const { limit, has_attribute: hasAttribute } = validateArgs(listInventoryArgsSchema, args);
        return client.getDevicesInventory({ limit, hasAttribute });
      });
    }
  );

  server.registerTool(
    'mender.inventory.groups.list',
    {
      description: 'List inventory groups.',
      annotations: READ_ONLY
    },
    async () => {
      return runRead('mender.inventory.groups.list', async () => client.getInventoryGroups());
    }
  );

  server.registerTool(
    'mender.deployments.log.get',
    {
      description: 'Get the deployment log of one device within a deployment.',
      inputSchema: {
        deployment_id: deploymentIdInput,
        device_id: deviceIdInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.deployments.log.get', async () => {
        const { deployment_id: deploymentId, device_id: deviceId } = validateArgs(deploymentDeviceLogArgsSchema, args);
        return client.getDeploymentDeviceLog(deploymentId, deviceId);
      });
    }
  );

  server.registerTool(
    'mender.deployments.logs.list',
    {
      description: 'Get the deployment logs of every device in a deployment. Devices without a log are omitted.',
      inputSchema: {
        deployment_id: deploymentIdInput
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.deployments.logs.list', async () => {
        const { deployment_id: deploymentId } = validateArgs(deploymentIdArgsSchema, args);
        const logs = await client.getDeploymentLogs(deploymentId);
        return { deploymentId, deviceCount: logs.length, logs };
      });
    }
  );

  server.registerTool(
    'mender.auditlogs.list',
    {
      description: 'List audit log entries (Enterprise plans). Filters by user, action, object type and date range.',
      inputSchema: {
        user: z.string().optional().describe('User email or ID.'),
        action: z.string().optional().describe('Action name, e.g. create or update.'),
        object_type: z.string().optional().describe('Object type, e.g. deployment or user.'),
        start_date: z.string().optional().describe('ISO-8601 start of the time range.'),
        end_date: z.string().optional().describe('ISO-8601 end of the time range.'),
        limit: limitInput(500, 20)
      },
      annotations: READ_ONLY
    },
    async (args) => {
      return runRead('mender.auditlogs.list', async () => {
        const filters = validateArgs(listAuditLogsArgsSchema, args);
        return client.getAuditLogs({
          user: filters.user,
          action: filters.action,
          objectType: filters.object_type,
          startDate: filters.start_date,
          endDate: filters.end_date,
          limit: filters.limit
        });
      });
    }
  );

  server.registerResource(
    'mender-devices',
    'mender://devices',
    {
      title: 'Mender Devices',
      description: 'First page of devices known to the Mender server.',
      mimeType: 'application/json'
    },
    async (uri) => readJsonResource(uri, () => client.getDevices({ limit: 20 }))
  );

  server.registerResource(
    'mender-deployments',
    'mender://deployments',
    {
      title: 'Mender Deployments',
      description: 'Most recent deployments.',
      mimeType: 'application/json'
    },
    async (uri) => readJsonResource(uri, () => client.getDeployments({ limit: 10 }))
  );

  server.registerResource(
    'mender-artifacts',
    'mender://artifacts',
    {
      title: 'Mender Artifacts',
      description: 'Uploaded artifacts.',
      mimeType: 'application/json'
    },
    async (uri) => readJsonResource(uri, () => client.getArtifacts())
  );

  server.registerResource(
    'mender-releases',
    'mender://releases',
    {
      title: 'Mender Releases',
      description: 'Releases with their artifacts and tags.',
      mimeType: 'application/json'
    },
    async (uri) => readJsonResource(uri, () => client.getReleases({ limit: 20 }))
  );

  server.registerResource(
    'mender-inventory',
    'mender://inventory',
    {
      title: 'Mender Device Inventory',
      description: 'Inventory attributes of the first page of devices.',
      mimeType: 'application/json'
    },
    async (uri) => readJsonResource(uri, () => client.getDevicesInventory({ limit: 20 }))
  );

  server.registerResource(
    'mender-inventory-groups',
    'mender://inventory-groups',
    {
      title: 'Mender Inventory Groups',
      description: 'Inventory groups.',
      mimeType: 'application/json'
    },
    async (uri) => readJsonResource(uri, () => client.getInventoryGroups())
  );

  server.registerResource(
    'mender-device',
    new ResourceTemplate('mender://devices/{deviceId}', { list: undefined }),
    {
      title: 'Mender Device',
      description: 'One device by ID.',
      mimeType: 'application/json'
    },
    async (uri, variables) =>
      readJsonResource(uri, async () => {
        const { device_id: deviceId } = validateArgs(deviceIdArgsSchema, {
          device_id: templateVariable(variables, 'deviceId')
        });
        return client.getDevice(deviceId);
      })
  );

  server.registerResource(
    'mender-deployment',
    new ResourceTemplate('mender://deployments/{deploymentId}', { list: undefined }),
    {
      title: 'Mender Deployment',
      description: 'One deployment by ID.',
      mimeType: 'application/json'
    },
    async (uri, variables) =>
      readJsonResource(uri, async () => {
        const { deployment_id: deploymentId } = validateArgs(deploymentIdArgsSchema, {
          deployment_id: templateVariable(variables, 'deploymentId')
        });
        return client.getDeployment(deploymentId);
      })
  );

  server.registerResource(
    'mender-release',
    new ResourceTemplate('mender://releases/{releaseName}', { list: undefined }),
    {
      title: 'Mender Release',
      description: 'One release by name.',
      mimeType: 'application/json'
    },
    async (uri, variables) =>
      readJsonResource(uri, async () => {
        const { release_name: releaseName } = validateArgs(releaseNameArgsSchema, {
          release_name: templateVariable(variables, 'releaseName')
        });
        return client.getRelease(releaseName);
      })
  );

  server.registerResource(
    'mender-device-inventory',
    new ResourceTemplate('mender://inventory/{deviceId}', { list: undefined }),
    {
      title: 'Mender Device Inventory Entry',
      description: 'Inventory attributes of one device.',
      mimeType: 'application/json'
    },
    async (uri, variables) =>
      readJsonResource(uri, async () => {
        const { device_id: deviceId } = validateArgs(deviceIdArgsSchema, {
          device_id: templateVariable(variables, 'deviceId')
        });
        return client.getDeviceInventory(deviceId);
      })
  );

  server.registerPrompt(
    'mender_deployment_triage',
    {
      title: 'Mender Deployment Triage',
      description: 'Prompt template for investigating a failing or stuck deployment.',
      argsSchema: {
        deploymentId: z.string().describe('Deployment ID to investigate.')
      }
    },
    async ({ deploymentId }) => {
      return {
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text:
                `Deployment: ${deploymentId}\n` +
                'Use mender.deployments.get to read the status statistics, then mender.deployments.logs.list ' +
                'for the device logs. Summarize failing devices, the first ERROR line of each log, and whether ' +
                'the artifact is compatible with the device types involved (mender.releases.get).'
            }
          }
        ]
      };
    }
  );

  server.registerPrompt(
    'mender_fleet_overview',
    {
      title: 'Mender Fleet Overview',
      description: 'Prompt template for a short status report of the device fleet.'
    },
    async () => {
      return {
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text:
                'Use mender.devices.list with status=pending and status=accepted, mender.inventory.groups.list and ' +
                'mender.deployments.list with status=inprogress. Report device counts per status, groups, and any ' +
                'deployment that has failures.'
            }
          }
        ]
      };
    }
  );

  logger.info({ serverUrl: client.getServerInfo().serverUrl }, 'MCP Mender server constructed');
  return server;
}
