export type UserRole = "buyer" | "seller";

export interface User {
  id: number;
  username: string;
  email: string; // stored lower-case
  password_hash: string;
  is_active: boolean;
  role: UserRole;
  created_at: Date;
}

export type UserPrivate = Pick<
  User,
  "id" | "username" | "email" | "role" | "is_active"
>;

export interface RefreshToken {
  id: number;
  token: string;
  user_id: number;
  expired_at: Date;
}

export interface Category {
  id: number;
  name: string;
  parent_id: number | null;
  is_active: boolean;
}

export interface Product {
  id: number;
  name: string;
  description: string | null;
  price: number;
  image_url: string | null;
  stock: number;
  is_active: boolean;
  rating: number;
  category_id: number;
  seller_id: number;
}

export interface ProductWithCategory extends Product {
  category: Category;
}

export interface Review {
  id: number;
  user_id: number;
  product_id: number;
  comment: string | null;
  grade: number; // 1..5
  created_at: Date;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: "bearer";
}

export interface Page {
  offset: number;
  limit: number;
}
