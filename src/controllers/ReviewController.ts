import { Request, Response } from "express";
import { productService } from "../services/ProductService";
import { reviewService } from "../services/ReviewService";
import { parseId, parsePage, sendValidationError } from "../utils/validation";

export class ReviewController {
  static async getProductReviews(req: Request, res: Response) {
    try {
      const productId = parseId(req.params.id);
      const product =
        productId === null ? null : await productService.findActive(productId);
      if (!product) {
        return res
          .status(404)
          .json({ error: `Product ${req.params.id} not found or is inactive` });
      }

      const paging = parsePage(req.query);
      if ("error" in paging) return sendValidationError(res, paging.error);

      const reviews = await reviewService.listForProduct(
        product.id,
        paging.page,
      );
      res.json(reviews);
    } catch (error) {
      console.error("Get Reviews Error:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  }
}
