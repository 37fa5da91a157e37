import { Request, Response } from "express";
import { Category } from "../models/types";
import { categoryService } from "../services/CategoryService";
import { productService } from "../services/ProductService";
import { CacheService, CACHE_KEYS, CACHE_TTL } from "../utils/cache";
import { parseId, parsePage, sendValidationError } from "../utils/validation";

export class CategoryController {
  static async getCategories(req: Request, res: Response) {
    try {
      const paging = parsePage(req.query);
      if ("error" in paging) return sendValidationError(res, paging.error);
      const { offset, limit } = paging.page;

      const cacheKey = CACHE_KEYS.categories(offset, limit);
      const cached = await CacheService.get<Category[]>(cacheKey);
      if (cached) return res.json(cached);

      const categories = await categoryService.listActive(paging.page);

      await CacheService.set(cacheKey, categories, CACHE_TTL.LONG); // Categories are seeded, rarely change
      res.json(categories);
    } catch (error) {
      console.error("Get Categories Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  static async getCategoryProducts(req: Request, res: Response) {
    try {
      const categoryId = parseId(req.params.id);
      if (categoryId === null) {
        return res.status(404).json({ error: "Category not found" });
      }

      const paging = parsePage(req.query);
      if ("error" in paging) return sendValidationError(res, paging.error);

      const products = await productService.listByCategory(
        categoryId,
        paging.page,
      );

      // An empty page is fine for an existing category
      if (products.length === 0) {
        const category = await categoryService.findActive(categoryId);
        if (!category) {
          return res
            .status(404)
            .json({ error: `Category '${categoryId}' not found or inactive` });
        }
      }

      res.json(products);
    } catch (error) {
      console.error("Get Category Products Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }
}
