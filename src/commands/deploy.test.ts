import { describe, it, expect } from "vitest";
import { cronExpression, renderCronFile, renderDockerCompose, renderSystemdUnit } from "./deploy";

const opts = { portfolioValue: 250_000, riskCapPercent: 1.5, checkIntervalMinutes: 30 };

describe("cronExpression", () => {
  it("maps known intervals and defaults to hourly", () => {
    expect(cronExpression(60)).toBe("0 * * * *");
    expect(cronExpression(30)).toBe("0,30 * * * *");
    expect(cronExpression(15)).toBe("0,15,30,45 * * * *");
    expect(cronExpression(5)).toBe("*/5 * * * *");
    expect(cronExpression(45)).toBe("0 * * * *");
  });
});

describe("deploy templates", () => {
  it("renders the systemd unit", () => {
    const lines = renderSystemdUnit(opts).split("\n");
    expect(lines).toContain(
      "ExecStart=/usr/bin/npm run --silent start -- daemon --continuous --portfolio-value 250000 --risk-cap-percent 1.5 --check-interval 30",
    );
    expect(lines).toContain("WorkingDirectory=/opt/rs-momentum");
    expect(lines).toContain("Restart=always");
    expect(lines[lines.length - 2]).toBe("WantedBy=multi-user.target");
  });

  it("renders the cron file", () => {
    expect(renderCronFile(opts)).toBe(
      "# rs-momentum daemon - run every 30 minutes\n" +
        "0,30 * * * * cd /opt/rs-momentum && npm run --silent start -- daemon --portfolio-value 250000 " +
        "--risk-cap-percent 1.5 >> /var/log/rs-momentum.log 2>&1\n" +
        "\n" +
        "# Optional: clean old logs weekly\n" +
        "0 2 * * 0 find /var/log/rs-momentum.log -mtime +7 -delete\n",
    );
  });

  it("renders the compose service", () => {
    const lines = renderDockerCompose({ ...opts, riskCapPercent: 2 }).split("\n");
    expect(lines[1]).toBe("  rs-momentum:");
    expect(lines).toContain("    container_name: rs-momentum-daemon");
    expect(lines).toContain(
      "    command: npm run --silent start -- daemon --continuous --portfolio-value 250000 --risk-cap-percent 2.0 --check-interval 30",
    );
  });
});
