import { Citation, PoliticalRisk, PoliticalRiskDocument } from '@risk-router/shared/types';

/**
 * Nine-column markdown table row:
 * | Country | Political Type | Risk Information | Likelihood (0-5) | Reasoning | Publication Date | Citation Title | Source | URL |
 */
const TABLE_ROW = /\|\s*([^|]+)\s*\|\s*([^|]+)\s*\|\s*([^|]+)\s*\|\s*(\d+)\s*\|\s*([^|]+)\s*\|\s*([^|]+)\s*\|\s*([^|]+)\s*\|\s*([^|]+)\s*\|\s*([^|]+)\s*\|/g;

function tableRows(analysis: string): string[][] {
  const rows: string[][] = [];
  for (const match of analysis.matchAll(TABLE_ROW)) {
    const cells = match.slice(1, 10).map((cell) => cell.trim());
    if (cells[0].toLowerCase() === 'country' && cells[1].toLowerCase().includes('political type')) {
      continue;
    }
    rows.push(cells);
  }
  return rows;
}

function section(analysis: string, heading: string): string | undefined {
  const match = new RegExp(`${heading}[^\\n]*\\n?([\\s\\S]*?)(?=###|$)`).exec(analysis);
  const body = match?.[1].trim();
  return body ? body : undefined;
}

/**
 * Turn the political risk stage's markdown into the structured document stored in the event log
 */
export function parsePoliticalRisks(analysis: string, now: Date = new Date()): PoliticalRiskDocument {
  const political_risks: PoliticalRisk[] = tableRows(analysis).map((cells) => ({
    country: cells[0],
    political_type: cells[1],
    risk_information: cells[2],
    likelihood: Number.parseInt(cells[3], 10),
    likelihood_reasoning: cells[4],
    publication_date: cells[5],
    citation_title: cells[6],
    citation_name: cells[7],
    citation_url: cells[8],
  }));

  const document: PoliticalRiskDocument = {
    political_risks,
    timestamp: now.toISOString(),
  };

  const query = /(?:using the )?query:?\s*"([^"]+)"/i.exec(analysis);
  if (query) {
    document.search_query = query[1];
  }

  const count = /A total of (\d+) search results/.exec(analysis);
  if (count) {
    document.search_results_count = Number.parseInt(count[1], 10);
  }

  const equipmentImpact = section(analysis, 'Equipment Impact Analysis');
  if (equipmentImpact) document.equipment_impact = equipmentImpact;

  const mitigation = section(analysis, 'Mitigation Recommendations');
  if (mitigation) document.mitigation_recommendations = mitigation;

  const description = section(analysis, 'Analysis Description');
  if (description) document.analysis_description = description;

  return document;
}

/**
 * Citations referenced by the risk table, deduplicated on (url, title)
 */
export function extractCitations(analysis: string): Citation[] {
  const citations: Citation[] = [];
  for (const cells of tableRows(analysis)) {
    const citation: Citation = {
      title: cells[6],
      source: cells[7],
      url: cells[8],
      publication_date: cells[5],
      country: cells[0],
      risk_type: cells[1],
    };
    if (!citations.some((c) => c.url === citation.url && c.title === citation.title)) {
      citations.push(citation);
    }
  }
  return citations;
}

export function formatCitationsMarkdown(citations: Citation[]): string {
  if (citations.length === 0) {
    return '### References\n\nNo citations available.';
  }
  const lines = citations.map((c, i) => `${i + 1}. ["${c.title}" - ${c.source}](${c.url})`);
  return `### References\n\n${lines.join('\n\n')}\n`;
}
