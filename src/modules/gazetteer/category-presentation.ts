import { CATEGORY_TAGS, CategoryTag } from './gazetteer.types';

export interface CategoryPresentation {
  label: string;
  color: string;
}

/**
 * Display label and subtotal row colour per category
 */
export const CATEGORY_PRESENTATION: Readonly<Record<CategoryTag, CategoryPresentation>> = {
  Honda: { label: 'Honda', color: '#ff6b35' },
  'M&M': { label: 'M & M', color: '#2e8b57' },
  Toyota: { label: 'Toyota', color: '#4169e1' },
  Skoda: { label: 'Skoda', color: '#8b5cf6' },
  Glovis: { label: 'Glovis', color: '#f59e0b' },
  Tata: { label: 'Tata', color: '#06b6d4' },
  JohnDeere: { label: 'John Deere', color: '#367c2b' },
  Spinny: { label: 'Spinny', color: '#7c3aed' },
  JSW_MG: { label: 'JSW MG', color: '#b91c1c' },
  'R.sai': { label: 'R.Sai', color: '#0f766e' },
  MohanLogistics: { label: 'Mohan Logistics', color: '#a16207' },
  SAIAuto: { label: 'Sai Auto', color: '#be185d' },
  Kwick: { label: 'Kwick', color: '#4d7c0f' },
  MarketLoad: { label: 'Market Load', color: '#ec4899' },
  Other: { label: 'Other', color: '#6b7280' },
};

export const CATEGORY_ORDER: ReadonlyArray<CategoryTag> = CATEGORY_TAGS;

export const GRAND_TOTAL_COLOR = '#1e3a5f';
