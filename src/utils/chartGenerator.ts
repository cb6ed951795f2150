import * as fs from "fs";
import * as path from "path";
import {
  ScenarioResult,
  ScenarioError,
  InterestChartData,
  GrowthChartData,
} from "../models/ScenarioResult";

export type ChartableResult = Exclude<ScenarioResult, ScenarioError>;

export interface ChartSeries {
  label: string;
  value: number;
  color: string;
}

const STATUS_COLORS: Record<ChartableResult["status"], string> = {
  success: "#10b981", // Green
  warning: "#f59e0b", // Yellow/Orange
  not_achievable: "#ef4444", // Red
};

/**
 * Turn a scenario's two-point chart payload into labelled bar series
 */
export function getChartSeries(chartData: InterestChartData | GrowthChartData): ChartSeries[] {
  if ("loanInterest" in chartData) {
    return [
      { label: "Total Loan Interest", value: chartData.loanInterest, color: "#ef4444" },
      { label: "Investment Value", value: chartData.investmentGain, color: "#3b82f6" },
    ];
  }
  return [
    { label: "Investment Future Value", value: chartData.investmentFV, color: "#3b82f6" },
    { label: "Remaining Loan Balance", value: chartData.remainingLoan, color: "#ef4444" },
  ];
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Render a Chart.js bar chart page for a scenario result
 */
export function renderScenarioChartHTML(title: string, result: ChartableResult): string {
  const series = getChartSeries(result.chartData);
  const statusColor = STATUS_COLORS[result.status];

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)}</title>
    <script src="https://cdn.jsdelivr.net/npm/chart.js@4.4.0/dist/chart.umd.min.js"></script>
    <style>
        body {
            font-family: Arial, sans-serif;
            margin: 20px;
            background-color: #f5f5f5;
        }
        .container {
            max-width: 900px;
            margin: 0 auto;
            background-color: white;
            padding: 20px;
            border-radius: 8px;
            box-shadow: 0 2px 4px rgba(0,0,0,0.1);
        }
        .status {
            display: inline-block;
            padding: 4px 10px;
            border-radius: 4px;
            color: white;
            font-weight: bold;
        }
        .guidance {
            background-color: #f9f9f9;
            padding: 15px;
            border-radius: 4px;
            margin: 20px 0;
        }
        .chart-container {
            position: relative;
            height: 400px;
        }
    </style>
</head>
<body>
    <div class="container">
        <h1>${escapeHtml(title)}</h1>
        <span class="status" style="background-color: ${statusColor};">${result.status}</span>
        <div class="guidance">
            <p>${escapeHtml(result.guidanceMessage)}</p>
            <p><strong>Recommendation:</strong> ${escapeHtml(result.recommendation)}</p>
            <p><strong>Monthly EMI:</strong> ₹${Math.round(result.monthlyEMI).toLocaleString("en-IN")}
               &nbsp; <strong>Monthly Investment:</strong> ₹${Math.round(result.monthlyInvestment).toLocaleString("en-IN")}</p>
        </div>
        <div class="chart-container">
            <canvas id="scenarioChart"></canvas>
        </div>
    </div>

    <script>
        const ctx = document.getElementById('scenarioChart').getContext('2d');

        new Chart(ctx, {
            type: 'bar',
            data: {
                labels: ${JSON.stringify(series.map((s) => s.label))},
                datasets: [
                    {
                        label: 'Amount (₹)',
                        data: ${JSON.stringify(series.map((s) => Math.round(s.value)))},
                        backgroundColor: ${JSON.stringify(series.map((s) => s.color))}
                    }
                ]
            },
            options: {
                responsive: true,
                maintainAspectRatio: false,
                plugins: {
                    legend: { display: false },
                    tooltip: {
                        callbacks: {
                            label: function(context) {
                                return '₹' + context.parsed.y.toLocaleString('en-IN');
                            }
                        }
                    }
                },
                scales: {
                    y: {
                        beginAtZero: true,
                        ticks: {
                            callback: function(value) {
                                return '₹' + value.toLocaleString('en-IN');
                            }
                        }
                    }
                }
            }
        });
    </script>
</body>
</html>`;
}

/**
 * Write a scenario chart page, creating the output directory if needed
 */
export function generateScenarioChartHTML(
  title: string,
  result: ChartableResult,
  outputPath: string
): void {
  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  fs.writeFileSync(outputPath, renderScenarioChartHTML(title, result), "utf-8");
  console.log(`Chart generated: ${outputPath}`);
}
