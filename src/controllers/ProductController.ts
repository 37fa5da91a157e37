import { Request, Response } from "express";
import { OwnedResource } from "../policy/AccessPolicy";
import { authenticatedCaller, sendDenied } from "../middleware/auth";
import { productCreateSchema, productUpdateSchema } from "../models/schemas";
import { categoryService } from "../services/CategoryService";
import { productService } from "../services/ProductService";
import { parseId, parsePage, sendValidationError } from "../utils/validation";

/** Ownership view of the product named by `:id`, for the update guard. */
export const loadProductOwner = async (
  req: Request,
): Promise<OwnedResource | null> => {
  const id = parseId(req.params.id);
  if (id === null) return null;

  const product = await productService.findById(id);
  return product ? { ownerId: product.seller_id } : null;
};

export class ProductController {
  static async getProducts(req: Request, res: Response) {
    try {
      const paging = parsePage(req.query);
      if ("error" in paging) return sendValidationError(res, paging.error);

      const products = await productService.listActive(paging.page);
      res.json(products);
    } catch (error) {
      console.error("Get Products Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  static async getProduct(req: Request, res: Response) {
    try {
      const id = parseId(req.params.id);
      const product = id === null ? null : await productService.findActive(id);
      if (!product) {
        return res
          .status(404)
          .json({ error: `Product ${req.params.id} not found or is inactive` });
      }

      res.json(product);
    } catch (error) {
      console.error("Get Product Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  static async createProduct(req: Request, res: Response) {
    const seller = authenticatedCaller(req);
    if (!seller) return sendDenied(res, "NotAuthenticated");

    try {
      const parsed = productCreateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const input = parsed.data;

      const category = await categoryService.findActive(input.category_id);
      if (!category) {
        return res.status(404).json({
          error: `Category ${input.category_id} not found or is inactive`,
        });
      }

      const product = await productService.create(seller.id, input);
      res.status(201).json(product);
    } catch (error) {
      console.error("Create Product Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }

  // Ownership is enforced by authorize(..., loadProductOwner) on the route
  static async updateProduct(req: Request, res: Response) {
    try {
      const id = parseId(req.params.id);
      if (id === null) {
        return res.status(404).json({ error: "Product not found" });
      }

      const parsed = productUpdateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const changes = parsed.data;

      if (changes.category_id !== undefined) {
        const category = await categoryService.findActive(changes.category_id);
        if (!category) {
          return res.status(404).json({
            error: `Category ${changes.category_id} not found or is inactive`,
          });
        }
      }

      const product = await productService.update(id, changes);
      if (!product) {
        return res.status(404).json({ error: "Product not found" });
      }

      res.json(product);
    } catch (error) {
      console.error("Update Product Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }
}
