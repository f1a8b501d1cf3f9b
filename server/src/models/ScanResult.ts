import mongoose from 'mongoose';

const findingSchema = new mongoose.Schema(
  {
    dimension: { type: String, enum: ['http', 'ssl', 'dns'], required: true },
    severity: { type: String, enum: ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'], required: true },
    issue: { type: String, required: true },
    recommendation: { type: String, required: true },
  },
  { _id: false }
);

const GRADES = ['A', 'B', 'C', 'D', 'F'];

const checkReportSchema = new mongoose.Schema(
  {
    grade: { type: String, enum: GRADES, required: true },
    score: { type: Number, required: true },
    risk_points: { type: Number, required: true },
    degraded: { type: Boolean, required: true },
    error: { type: String, default: null },
    details: { type: mongoose.Schema.Types.Mixed, default: {} },
  },
  { _id: false, minimize: false }
);

const scanResultSchema = new mongoose.Schema({
  scan_id: { type: String, required: true, unique: true },
  url: { type: String, required: true },
  scanned_at: { type: Date, required: true, index: true },
  scan_duration_ms: { type: Number, required: true },
  overall_grade: { type: String, enum: GRADES, required: true },
  risk_score: { type: Number, required: true },
  risk_level: {
    type: String,
    enum: ['MINIMAL', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'],
    required: true,
  },
  http_grade: { type: String, enum: GRADES, required: true },
  ssl_grade: { type: String, enum: GRADES, required: true },
  dns_grade: { type: String, enum: GRADES, required: true },
  critical_issues_count: { type: Number, required: true },
  high_issues_count: { type: Number, required: true },
  medium_issues_count: { type: Number, required: true },
  low_issues_count: { type: Number, required: true },
  recommendations: { type: [String], default: [] },
  findings: { type: [findingSchema], default: [] },
  degraded_checks: { type: [String], default: [] },
  http_scan: { type: checkReportSchema, required: true },
  ssl_scan: { type: checkReportSchema, required: true },
  dns_scan: { type: checkReportSchema, required: true },
  owasp: { type: mongoose.Schema.Types.Mixed, required: true },
});

export const ScanResultModel = mongoose.model('ScanResult', scanResultSchema);
