import { SavingsProjection } from "../models/SavingsProjection";
import { roundCurrency } from "./math";
import * as fs from "fs";
import * as path from "path";

const SCENARIO_COLORS = ["#ef4444", "#f59e0b", "#10b981", "#3b82f6", "#8b5cf6"];

function formatAmount(value: number, currencySymbol: string): string {
  return `${currencySymbol}${roundCurrency(value).toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

/**
 * Render an HTML page with a Chart.js graph of the reconstructed history, the
 * recorded totals that seed the forecast, and every forecast scenario on one
 * date axis.
 */
export function renderSavingsChartHTML(
  projection: SavingsProjection,
  currencySymbol: string = "₪"
): string {
  const forecastDates = projection.scenarios[0]?.series.map((p) => p.date) ?? [];
  const labels = [...projection.history.map((p) => p.date), ...forecastDates];

  const datasets = [
    {
      label: "History",
      data: projection.history.map((p) => ({ x: p.date, y: p.value })),
      borderColor: "#111827",
      borderWidth: 2,
      pointRadius: 3,
      fill: false,
      tension: 0,
    },
    {
      label: "Recorded totals",
      data: projection.cumulative.map((value, i) => ({ x: projection.recordDates[i], y: value })),
      borderColor: "#6b7280",
      borderWidth: 1,
      pointRadius: 4,
      showLine: false,
      fill: false,
    },
    ...projection.scenarios.map((scenario, i) => ({
      label: scenario.label,
      data: scenario.series.map((p) => ({ x: p.date, y: p.value })),
      borderColor: SCENARIO_COLORS[i % SCENARIO_COLORS.length],
      borderWidth: 2,
      borderDash: [6, 4],
      pointRadius: 0,
      fill: false,
      tension: 0,
    })),
  ];

  const finals = projection.scenarios.map((scenario, i) => {
    const last = scenario.series[scenario.series.length - 1];
    return `<div class="final" style="color: ${SCENARIO_COLORS[i % SCENARIO_COLORS.length]}">${scenario.label}: ${formatAmount(last ? last.value : projection.lastBalance, currencySymbol)}</div>`;
  });

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Historical and Forecast Savings</title>
    <script src="https://cdn.jsdelivr.net/npm/chart.js@4.4.0/dist/chart.umd.min.js"></script>
    <style>
        body { font-family: Arial, sans-serif; margin: 20px; background-color: #f5f5f5; }
        .container { max-width: 1200px; margin: 0 auto; background-color: white; padding: 20px; border-radius: 8px; }
        .metadata { background-color: #f9f9f9; padding: 15px; border-radius: 4px; margin-bottom: 20px; }
        .chart-container { position: relative; height: 500px; margin-top: 20px; }
        .finals { display: flex; gap: 24px; margin-top: 20px; font-weight: bold; }
    </style>
</head>
<body>
    <div class="container">
        <h1>Historical and Forecast Savings</h1>
        <div class="metadata">
            <div>Last balance (${projection.lastDate}): ${formatAmount(projection.lastBalance, currencySymbol)}</div>
            <div>Monthly contribution: ${formatAmount(projection.monthlyContribution, currencySymbol)}</div>
            <div>Horizon: ${projection.years} years</div>
        </div>
        <div class="chart-container">
            <canvas id="savingsChart"></canvas>
        </div>
        <h3>Forecasted Savings after ${projection.years} years:</h3>
        <div class="finals">
            ${finals.join("\n            ")}
        </div>
    </div>
    <script>
        const ctx = document.getElementById('savingsChart').getContext('2d');
        new Chart(ctx, {
            type: 'line',
            data: {
                labels: ${JSON.stringify(labels)},
                datasets: ${JSON.stringify(datasets)}
            },
            options: {
                responsive: true,
                maintainAspectRatio: false,
                plugins: {
                    legend: { display: true, position: 'top' }
                },
                scales: {
                    x: { title: { display: true, text: 'Date' } },
                    y: { title: { display: true, text: '${currencySymbol}' } }
                }
            }
        });
    </script>
</body>
</html>`;
}

/**
 * Write the savings chart to an HTML file, creating the directory if needed.
 */
export function generateSavingsChartHTML(
  projection: SavingsProjection,
  outputPath: string,
  currencySymbol?: string
): void {
  const html = renderSavingsChartHTML(projection, currencySymbol);

  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  fs.writeFileSync(outputPath, html, "utf-8");
  console.log(`Graph generated: ${outputPath}`);
}
