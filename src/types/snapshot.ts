export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Viewport {
  width: number;
  height: number;
}

export interface ElementDescriptor {
  tag: string;
  type: string | null;
  id: string;
  classes: string;
  placeholder: string;
  text: string;
  ariaLabel: string | null;
  role: string | null;
  href: string | null;
  visible: boolean;
  enabled: boolean;
  boundingBox: BoundingBox | null;
}

export type PageType = 'ecommerce' | 'search' | 'form' | 'content';

export interface StructuralFacts {
  hasNavigation: boolean;
  hasSearch: boolean;
  hasForms: boolean;
  hasProducts: boolean;
  pageType: PageType;
}

export interface PageSnapshot {
  readonly url: string;
  readonly title: string;
  readonly viewport: Viewport;
  readonly elements: readonly ElementDescriptor[];
  readonly structuralFacts: StructuralFacts;
}
