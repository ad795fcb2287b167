import { z } from 'zod';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const TARGET_NAME = /^[A-Za-z0-9][A-Za-z0-9_.:-]*$/;
const PORT = /^(\d{1,5})(?::(\d{1,5}))?(?:\/(tcp|udp))?$/;
const CONTAINER_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

const containerNameSchema = z.string().regex(CONTAINER_NAME, 'container names start with a letter or digit and contain only letters, digits, _ . and -');

/**
 * "5432", "8080:80" or "53:53/udp"; a bare number maps a port to itself
 */
export const portSchema = z.union([z.number().int().min(1).max(65535), z.string().regex(PORT, 'expected HOST[:CONTAINER][/PROTOCOL]')])
  .transform((value) => {
    const m = PORT.exec(`${value}`);
    const host = Number(m?.[1]);
    const container = m?.[2] !== undefined ? Number(m[2]) : host;
    const protocol: 'tcp' | 'udp' = m?.[3] === 'udp' ? 'udp' : 'tcp';
    return { host, container, protocol };
  });

export const serviceSchema = z.object({
  /**
   * Container name; defaults to the key the service is declared under
   */
  containerName: containerNameSchema.optional(),
  image: z.string().min(1),
  ports: z.array(portSchema).default([]),
  env: z.record(z.string()).default({}),
  args: z.array(z.string()).default([]),
  command: z.array(z.string()).default([]),
}).strict();

const targetCommon = {
  /**
   * A unique name for this target
   */
  name: z.string().regex(TARGET_NAME, 'target names start with a letter or digit and contain no spaces'),
  description: z.string().optional(),
  dependsOn: z.array(z.string()).default([]),
};

export const commandTargetSchema = z.object({
  ...targetCommon,
  type: z.literal('command'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),

  /**
   * Working directory, relative to the directory holding rig.json
   */
  cwd: z.string().optional(),
  env: z.record(z.string()).default({}),

  /**
   * Store the trimmed stdout under this variable name for later targets
   */
  captureAs: z.string().regex(IDENTIFIER).optional(),

  /**
   * Show the tool's output while it runs
   */
  echo: z.boolean().default(false),
}).strict();

export const serviceTargetSchema = z.object({
  ...targetCommon,
  type: z.literal('service'),
  service: z.string().min(1),
  action: z.enum(['up', 'stop', 'remove']),
}).strict();

export const groupTargetSchema = z.object({
  ...targetCommon,
  type: z.literal('group'),
}).strict();

export const targetSchema = z.discriminatedUnion('type', [
  commandTargetSchema,
  serviceTargetSchema,
  groupTargetSchema,
]);

export const rigJsonSchema = z.object({
  $schema: z.string().optional(),

  /**
   * Container runtime CLI used for services
   */
  runtime: z.string().min(1).default('docker'),

  /**
   * Parameter defaults; overridden with --name value on the command line
   */
  params: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(v => `${v}`)).default({}),

  /**
   * Keyed by the container name, unless a service sets containerName
   */
  services: z.record(z.string(), serviceSchema).default({}).superRefine((services, ctx) => {
    for (const [key, service] of Object.entries(services)) {
      if (service.containerName === undefined && !CONTAINER_NAME.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'service key is used as the container name; set containerName or use only letters, digits, _ . and -',
        });
      }
    }
  }),
  targets: z.array(targetSchema),
}).strict();

export type RigJson = z.infer<typeof rigJsonSchema>;
export type ServiceDefinition = z.infer<typeof serviceSchema>;
export type TargetDefinition = z.infer<typeof targetSchema>;
export type CommandTargetDefinition = z.infer<typeof commandTargetSchema>;
export type ServiceTargetDefinition = z.infer<typeof serviceTargetSchema>;
export type ServiceOperation = ServiceTargetDefinition['action'];
