#!/usr/bin/env node
import 'dotenv/config';
import http from 'node:http';
import https from 'node:https';
import type net from 'node:net';
import os from 'node:os';
import qrcode from 'qrcode-terminal';
import { createApp } from './app.js';
import { AuditLogger } from './audit-log.js';
import { CredentialGate } from './auth.js';
import { generateSelfSignedCertificate } from './cert.js';
import { APP_NAME, APP_VERSION, USAGE, parseCliArgs, resolveConfig, type CliOptions, type ServerConfig } from './config.js';
import { errorMessage } from './errors.js';
import { PathResolver } from './path-resolver.js';
import { UploadWriter } from './upload-writer.js';

function getLanAddress(): string | undefined {
  const nets = os.networkInterfaces();
  for (const entries of Object.values(nets)) {
    if (!entries) {
      continue;
    }
    for (const info of entries) {
      if (info.family === 'IPv4' && !info.internal) {
        return info.address;
      }
    }
  }
  return undefined;
}

function fail(message: string): never {
  console.error(`[${APP_NAME}] ${message}`);
  process.exit(1);
}

const SHUTDOWN_GRACE_MS = 5_000;

function registerShutdown(server: net.Server): void {
  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) {
      return;
    }
    closing = true;
    console.log(`[${APP_NAME}] ${signal} received, shutting down`);
    server.close((error) => {
      if (error) {
        console.error(`[${APP_NAME}] close failed (${error.message})`);
        process.exit(1);
      }
      process.exit(0);
    });
    setTimeout(() => process.exit(0), SHUTDOWN_GRACE_MS).unref();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

function printBanner(config: ServerConfig, root: string, port: number): void {
  const protocol = config.tls ? 'https' : 'http';
  const lan = getLanAddress();
  const lanUrl = lan ? `${protocol}://${lan}:${port}/` : null;

  console.log(`[${APP_NAME}] v${APP_VERSION} listening on ${config.host}:${port}`);
  console.log(`[${APP_NAME}] serving: ${root}`);
  console.log(`[${APP_NAME}] local: ${protocol}://localhost:${port}/`);
  if (lanUrl) {
    console.log(`[${APP_NAME}] lan: ${lanUrl}`);
  }
  const username = config.credentials?.username;
  console.log(`[${APP_NAME}] auth: ${username ? `enabled (user: ${username})` : 'disabled (public access)'}`);
  if (config.tls) {
    console.log(`[${APP_NAME}] tls: enabled (self-signed, browsers will warn)`);
  }
  if (config.auditDir) {
    console.log(`[${APP_NAME}] audit: ${config.auditDir}`);
  }
  if (lanUrl) {
    console.log(`[${APP_NAME}] scan to connect:`);
    qrcode.generate(lanUrl, { small: true });
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  let config: ServerConfig;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    fail(`${errorMessage(error)}\n\n${USAGE}`);
  }
  if (options.help) {
    console.log(USAGE);
    return;
  }
  if (options.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    return;
  }

  try {
    config = resolveConfig(options);
  } catch (error) {
    fail(errorMessage(error));
  }

  let resolver: PathResolver;
  try {
    resolver = await PathResolver.create(config.root);
  } catch (error) {
    fail(`cannot serve ${config.root}: ${errorMessage(error)}`);
  }

  const app = createApp({
    resolver,
    gate: new CredentialGate(config.credentials),
    writer: new UploadWriter(),
    audit: config.auditDir ? new AuditLogger({ dir: config.auditDir }) : null,
    logRequests: config.logRequests
  });

  let server: net.Server;
  if (config.tls) {
    console.log(`[${APP_NAME}] generating self-signed certificate...`);
    try {
      const { cert, key } = await generateSelfSignedCertificate({ organization: APP_NAME });
      server = https.createServer({ cert, key }, app);
    } catch (error) {
      fail(`tls requested but certificate generation failed: ${errorMessage(error)}`);
    }
  } else {
    server = http.createServer(app);
  }

  server.once('error', (error) => {
    fail(`server error: ${error.message}`);
  });
  registerShutdown(server);

  server.listen(config.port, config.host, () => {
    const address = server.address();
    const port = address && typeof address === 'object' ? address.port : config.port;
    printBanner(config, resolver.root, port);
  });
}

main().catch((error: unknown) => {
  fail(`startup failed: ${errorMessage(error)}`);
});
