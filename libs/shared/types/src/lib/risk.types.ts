import { RiskCategory } from './enums';

/**
 * Row returned by the schedule comparison RPC
 * Dates arrive as ISO strings; nullable columns stay null when unknown.
 */
export interface ScheduleComparisonRow {
  project_name: string | null;
  project_country: string | null;
  equipment_code: string;
  equipment_name: string | null;
  equipment_type?: string | null;
  p6_schedule_due_date: string | null;
  equipment_milestone_due_date: string | null;
  days_variance: number | null;
  days_until_p6_due: number | null;
  supplier_name?: string | null;
  manufacturing_location?: string | null;
  shipping_port?: string | null;
  receiving_port?: string | null;
  logistics_method?: string | null;
  alternative_suppliers?: string | null;
}

export interface RiskAssessment {
  riskFlag: RiskCategory;
  riskPoints: number;
}

export interface ScheduleItem extends ScheduleComparisonRow {
  risk_percentage: number;
  risk_flag: RiskCategory;
  risk_points: number;
}

export interface PoliticalRisk {
  country: string;
  political_type: string;
  risk_information: string;
  likelihood: number;
  likelihood_reasoning: string;
  publication_date: string;
  citation_title: string;
  citation_name: string;
  citation_url: string;
}

export interface PoliticalRiskDocument {
  political_risks: PoliticalRisk[];
  timestamp: string;
  search_query?: string;
  search_results_count?: number;
  equipment_impact?: string;
  mitigation_recommendations?: string;
  analysis_description?: string;
}

export interface Citation {
  title: string;
  source: string;
  url: string;
  publication_date?: string;
  country?: string;
  risk_type?: string;
}

export interface SearchResult {
  title: string;
  source: string;
  url: string;
  snippet: string;
}
