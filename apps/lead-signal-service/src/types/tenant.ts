/**
 * API caller, stored in the Supabase `tenants` table
 */
export interface Tenant {
  id: string;
  name: string;
  api_key: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}
