import type {
  AlertKind,
  AlertSeverity,
  AlertSubjectType,
  FollowUpStatus,
  IntakeDisposition,
  JobStatus,
} from "@/types/domain";

export type Json = string | number | boolean | null | { [key: string]: Json | undefined } | Json[];

// Hand-maintained to match supabase/migrations; keep both in sync.
export type Database = {
  public: {
    Tables: {
      jobs: {
        Row: {
          id: string;
          customer_name: string | null;
          job_type: string | null;
          description: string | null;
          status: JobStatus;
          scheduled_at: string | null;
          labor_hours: number;
          parts_used: Json;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          id?: string;
          customer_name?: string | null;
          job_type?: string | null;
          description?: string | null;
          status?: JobStatus;
          scheduled_at?: string | null;
          labor_hours?: number;
          parts_used?: Json;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          customer_name?: string | null;
          job_type?: string | null;
          description?: string | null;
          status?: JobStatus;
          scheduled_at?: string | null;
          labor_hours?: number;
          parts_used?: Json;
          updated_at?: string;
        };
        Relationships: [];
      };
      inventory_items: {
        Row: {
          id: string;
          name: string;
          quantity: number;
          unit: string;
          low_stock_threshold: number | null;
          unit_cost: number;
          updated_at: string;
        };
        Insert: {
          id?: string;
          name: string;
          quantity?: number;
          unit?: string;
          low_stock_threshold?: number | null;
          unit_cost?: number;
          updated_at?: string;
        };
        Update: {
          name?: string;
          quantity?: number;
          unit?: string;
          low_stock_threshold?: number | null;
          unit_cost?: number;
          updated_at?: string;
        };
        Relationships: [];
      };
      follow_ups: {
        Row: {
          id: string;
          job_id: string | null;
          customer_name: string | null;
          description: string;
          due_date: string;
          status: FollowUpStatus;
          created_at: string;
        };
        Insert: {
          id?: string;
          job_id?: string | null;
          customer_name?: string | null;
          description: string;
          due_date: string;
          status?: FollowUpStatus;
          created_at?: string;
        };
        Update: {
          job_id?: string | null;
          status?: FollowUpStatus;
        };
        Relationships: [
          {
            foreignKeyName: "follow_ups_job_id_fkey";
            columns: ["job_id"];
            isOneToOne: false;
            referencedRelation: "jobs";
            referencedColumns: ["id"];
          },
        ];
      };
      alerts: {
        Row: {
          id: string;
          kind: AlertKind;
          subject_type: AlertSubjectType;
          subject_id: string;
          severity: AlertSeverity;
          message: string;
          first_observed_at: string;
          last_observed_at: string;
          cleared_at: string | null;
        };
        Insert: {
          id?: string;
          kind: AlertKind;
          subject_type: AlertSubjectType;
          subject_id: string;
          severity: AlertSeverity;
          message: string;
          first_observed_at: string;
          last_observed_at: string;
          cleared_at?: string | null;
        };
        Update: {
          severity?: AlertSeverity;
          message?: string;
          last_observed_at?: string;
          cleared_at?: string | null;
        };
        Relationships: [];
      };
      voice_intakes: {
        Row: {
          id: string;
          transcript: string;
          transcription_confidence: number;
          extraction_confidence: number | null;
          duration_seconds: number;
          unmatched_text: string;
          mutations: Json;
          outcomes: Json;
          error_code: string | null;
          disposition: IntakeDisposition | null;
          created_at: string;
        };
        Insert: {
          id?: string;
          transcript: string;
          transcription_confidence: number;
          extraction_confidence?: number | null;
          duration_seconds: number;
          unmatched_text: string;
          mutations?: Json;
          outcomes?: Json;
          error_code?: string | null;
          disposition?: IntakeDisposition | null;
          created_at?: string;
        };
        Update: {
          mutations?: Json;
          outcomes?: Json;
          disposition?: IntakeDisposition | null;
        };
        Relationships: [];
      };
    };
    Views: {
      [_ in never]: never;
    };
    Functions: {
      apply_alert_scan: {
        Args: {
          upserts: Json;
          purge_ids: string[];
        };
        Returns: number;
      };
    };
    Enums: {
      [_ in never]: never;
    };
    CompositeTypes: {
      [_ in never]: never;
    };
  };
};
