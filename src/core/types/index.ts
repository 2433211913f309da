// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0

export interface GeoLocation {
  latitude: number;
  longitude: number;
}

export type LocationStatus = 'idle' | 'pending' | 'available' | 'unavailable';

export type AppTab = 'agent' | 'scanner' | 'weather' | 'ipm';

// ============================================================
// CHAT
// ============================================================

export interface ChatAction {
  action: string;
  label: string;
}

export interface ChatMessage {
  id: string;
  role: 'user' | 'assistant';
  content: string;
  /** Data URI of the photo the user attached. */
  image?: string;
  analysis?: ChatAnalysis;
  suggestions?: string[];
  actions?: ChatAction[];
  timestamp: number;
}

export type ChatStatus = 'idle' | 'pending' | 'errored';

export interface ChatImageAttachment {
  file: Blob;
  fileName: string;
  dataUrl: string;
}

export interface ChatRequest {
  message: string;
  sessionId?: string;
  location?: GeoLocation;
  cropType?: string;
  language: string;
}

export interface ChatResponse {
  status: string;
  session_id: string;
  message: string;
  analysis?: ChatAnalysis;
  suggestions?: string[];
  actions_available?: ChatAction[];
}

// ============================================================
// ANALYSIS
// ============================================================

export type UrgencyLevel = 'low' | 'medium' | 'high' | 'critical';

export interface ChemicalTreatment {
  product?: string;
  dosage?: string;
  safety?: string;
  [detail: string]: string | undefined;
}

export interface LeafAnalysis {
  disease_detected: boolean;
  disease_name: string;
  confidence: number;
  urgency_level: UrgencyLevel | string;
  description: string;
  symptoms: string[];
  treatment_organic: Record<string, string>;
  treatment_chemical: Record<string, string | ChemicalTreatment>;
  prevention_tips: string[];
  raw_analysis?: string;
}

/** Analysis attached to a chat reply; the model may omit any field. */
export type ChatAnalysis = Partial<LeafAnalysis> & { parse_error?: boolean };

export interface QuickDiagnosis {
  status: string;
  response: string;
}

// ============================================================
// WEATHER
// ============================================================

export interface CurrentWeather {
  temperature: number;
  humidity: number;
  wind_speed: number;
  precipitation: number;
  condition: string;
}

export interface DiseaseRisk {
  fungal_disease_risk: string;
  bacterial_disease_risk: string;
  pest_activity_risk: string;
  spray_conditions: string;
  overall_risk_level: string;
  overall_risk_score: number;
  alerts: string[];
  recommendations: string[];
}

export interface DiseaseRiskReport {
  weather: CurrentWeather;
  risks: DiseaseRisk;
}

export interface SprayWindow {
  date: string;
  quality: string;
  recommended_time: string;
  conditions: {
    wind_speed: number;
    precipitation: number;
    humidity: number;
  };
}

export interface SprayWindowReport {
  optimal_windows: SprayWindow[];
  total_good_days?: number;
}

export interface ForecastDay {
  date: string;
  temp_max?: number;
  temp_min?: number;
  precipitation?: number;
  humidity?: number;
  wind_speed?: number;
  [field: string]: string | number | undefined;
}

export interface WeatherForecast {
  forecast: ForecastDay[];
}

// ============================================================
// IPM
// ============================================================

export interface IpmStrategyRequest {
  disease: string;
  crop: string;
  latitude?: number;
  longitude?: number;
  context?: string;
}

export interface IpmStrategy {
  strategy_name?: string;
  risk_assessment?: {
    current_severity: string;
    spread_risk: string;
    yield_impact_if_untreated: string;
  };
  immediate_actions?: Array<{ action: string; timing: string; priority: string }>;
  weekly_plan?: Array<{ week: number; actions: string[]; monitoring: string; expected_outcome: string }>;
  organic_solutions?: Array<{ product: string; application: string; frequency: string; effectiveness: string }>;
  chemical_solutions?: Array<{ product: string; dosage: string; safety_period: string; safety_precautions: string[] }>;
  companion_planting?: Array<{ plant: string; benefit: string; placement: string }>;
  biological_controls?: Array<{ organism: string; target_pest: string; application: string }>;
  prevention_for_next_season?: string[];
  optimal_spray_windows?: Array<{ date: string; quality: string }>;
  raw_strategy?: string;
}

export interface QuickRecommendation {
  status: string;
  disease: string;
  crop: string;
  recommendation: string;
}

export interface OutbreakDayRisk {
  date: string;
  risk_score: number;
  risk_level: string;
  factors: string[];
  diseases_at_risk: string[];
}

export interface OutbreakPrediction {
  crop: string;
  location: GeoLocation;
  daily_risks: OutbreakDayRisk[];
  peak_risk_days: OutbreakDayRisk[];
  /** "high_alert" | "moderate" | "favorable" */
  overall_outlook: string;
  recommendations: string[];
}

// ============================================================
// BACKEND STATUS
// ============================================================

export interface AIStatus {
  primary_provider: string;
  ollama: { status: string; models: string[] };
  groq: { status: string };
  gemini: { status: string };
}

export interface HealthStatus {
  status: string;
  ai_providers?: Record<string, string>;
}

/** `{status, data}` wrapper used by the weather, analysis and IPM routes. */
export interface Envelope<T> {
  status: string;
  data: T;
  error?: string | null;
}

// ============================================================
// SPEECH
// ============================================================

export interface SpeechSupport {
  recognition: boolean;
  synthesis: boolean;
}

export type { SpeechRecognitionLike, SpeechRecognitionConstructor } from './speech';
