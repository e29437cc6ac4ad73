import fs from "fs";
import logger from "../utils/logger";

export const SERVICE_NAME = "rs-momentum";
const INSTALL_DIR = `/opt/${SERVICE_NAME}`;

export interface DeployOptions {
  portfolioValue: number;
  riskCapPercent: number;
  checkIntervalMinutes: number;
}

function daemonArgs(o: DeployOptions): string {
  return (
    `daemon --continuous --portfolio-value ${o.portfolioValue.toFixed(0)} ` +
    `--risk-cap-percent ${o.riskCapPercent.toFixed(1)} --check-interval ${o.checkIntervalMinutes}`
  );
}

// ── Templates ────────────────────────────────────────────────────────────────

export function renderSystemdUnit(o: DeployOptions): string {
  return `[Unit]
Description=Relative-strength momentum daemon
After=network.target

[Service]
Type=simple
User=${SERVICE_NAME}
WorkingDirectory=${INSTALL_DIR}
ExecStart=/usr/bin/npm run --silent start -- ${daemonArgs(o)}
Restart=always
RestartSec=10
Environment=LOG_LEVEL=info
Environment=CG_PRO_API_KEY=your_api_key_here

[Install]
WantedBy=multi-user.target
`;
}

/** Known intervals map to aligned schedules; anything else runs hourly. */
export function cronExpression(checkIntervalMinutes: number): string {
  switch (checkIntervalMinutes) {
    case 60: return "0 * * * *";
    case 30: return "0,30 * * * *";
    case 15: return "0,15,30,45 * * * *";
    case 5:  return "*/5 * * * *";
    default: return "0 * * * *";
  }
}

export function renderCronFile(o: DeployOptions): string {
  return `# ${SERVICE_NAME} daemon - run every ${o.checkIntervalMinutes} minutes
${cronExpression(o.checkIntervalMinutes)} cd ${INSTALL_DIR} && npm run --silent start -- daemon --portfolio-value ${o.portfolioValue.toFixed(0)} --risk-cap-percent ${o.riskCapPercent.toFixed(1)} >> /var/log/${SERVICE_NAME}.log 2>&1

# Optional: clean old logs weekly
0 2 * * 0 find /var/log/${SERVICE_NAME}.log -mtime +7 -delete
`;
}

export function renderDockerCompose(o: DeployOptions): string {
  return `services:
  ${SERVICE_NAME}:
    build: .
    container_name: ${SERVICE_NAME}-daemon
    restart: unless-stopped
    environment:
      - LOG_LEVEL=info
      - CG_PRO_API_KEY=your_api_key_here
    volumes:
      - ./out:/app/out
      - ./logs:/app/logs
    command: npm run --silent start -- ${daemonArgs(o)}
`;
}

// ── Writers ──────────────────────────────────────────────────────────────────

export function writeSystemdUnit(o: DeployOptions, file = `./${SERVICE_NAME}.service`): string {
  fs.writeFileSync(file, renderSystemdUnit(o));
  logger.info(
    `Systemd unit written: ${file}\n` +
      `To install:\n` +
      `  sudo cp ${file} /etc/systemd/system/\n` +
      `  sudo systemctl daemon-reload\n` +
      `  sudo systemctl enable --now ${SERVICE_NAME}`,
  );
  return file;
}

export function writeCronFile(o: DeployOptions, file = `./${SERVICE_NAME}.cron`): string {
  fs.writeFileSync(file, renderCronFile(o));
  logger.info(
    `Cron file written: ${file}\n` +
      `To install:\n` +
      `  sudo cp ${file} /etc/cron.d/${SERVICE_NAME}\n` +
      `  sudo chmod 644 /etc/cron.d/${SERVICE_NAME}`,
  );
  return file;
}

export function writeDockerCompose(o: DeployOptions, file = "./docker-compose.yml"): string {
  fs.writeFileSync(file, renderDockerCompose(o));
  logger.info(`Docker Compose file written: ${file}\nTo deploy:\n  docker compose up -d`);
  return file;
}
