import { renderSavingsChartHTML } from '../../utils/graphGenerator';
import { SavingsPlanner } from '../../planner/savingsPlanner';
import { singleDeposit } from '../fixtures/deposits';

describe('renderSavingsChartHTML', () => {
  const projection = new SavingsPlanner({ records: singleDeposit }).project({
    monthlyContribution: 100,
    years: 1,
  });

  it('should show the final flat-growth balance', () => {
    const html = renderSavingsChartHTML(projection);
    expect(html).toContain('0% Growth: ₪2,200.00');
  });

  it('should show the seed balance and date', () => {
    const html = renderSavingsChartHTML(projection, '$');
    expect(html).toContain('Last balance (2024-01-10): $1,000.00');
  });

  it('should include the history and scenario datasets', () => {
    const html = renderSavingsChartHTML(projection);
    expect(html).toContain('"label":"History"');
    expect(html).toContain('"label":"Recorded totals","data":[{"x":"2024-01-10","y":1000}]');
    expect(html).toContain('"label":"8% Growth"');
  });
});
