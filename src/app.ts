import express from "express";
import cors from "cors";
import { Action, ResourceType } from "./policy/AccessPolicy";
import { authorize, identifyCaller } from "./middleware/auth";
import { requestLogger } from "./middleware/logger";
import {
  byClientIp,
  byLoginIdentity,
  rateLimit,
} from "./middleware/rateLimit";
import { AuthController } from "./controllers/AuthController";
import { UserController } from "./controllers/UserController";
import { CategoryController } from "./controllers/CategoryController";
import {
  ProductController,
  loadProductOwner,
} from "./controllers/ProductController";
import { ReviewController } from "./controllers/ReviewController";

const app = express();

app.use(cors());
app.use(express.json());
// OAuth2 password form on /token
app.use(express.urlencoded({ extended: false }));

app.use(requestLogger);

// Auth Routes
app.post(
  "/token",
  rateLimit({
    name: "login",
    windowSeconds: 60,
    maxRequests: 10,
    key: byLoginIdentity,
  }),
  authorize(Action.Create, ResourceType.Session),
  AuthController.login,
);
app.post(
  "/refresh",
  identifyCaller,
  authorize(Action.Update, ResourceType.Session),
  AuthController.refresh,
);
app.post(
  "/logout",
  identifyCaller,
  authorize(Action.Delete, ResourceType.Session),
  AuthController.logout,
);

// User Routes
app.post(
  "/users",
  rateLimit({
    name: "signup",
    windowSeconds: 300,
    maxRequests: 5,
    key: byClientIp,
  }),
  authorize(Action.Create, ResourceType.User),
  UserController.createUser,
);
app.get(
  "/users/me",
  identifyCaller,
  authorize(Action.Read, ResourceType.User),
  UserController.me,
);

// Catalog Routes
app.get(
  "/categories",
  authorize(Action.Read, ResourceType.Category),
  CategoryController.getCategories,
);
app.get(
  "/categories/:id/products",
  authorize(Action.Read, ResourceType.Product),
  CategoryController.getCategoryProducts,
);
app.get(
  "/products",
  authorize(Action.Read, ResourceType.Product),
  ProductController.getProducts,
);
app.get(
  "/products/:id",
  authorize(Action.Read, ResourceType.Product),
  ProductController.getProduct,
);
app.get(
  "/products/:id/reviews",
  authorize(Action.Read, ResourceType.ProductReviews),
  ReviewController.getProductReviews,
);

// Seller Routes
app.post(
  "/products",
  identifyCaller,
  authorize(Action.Create, ResourceType.Product),
  ProductController.createProduct,
);
app.put(
  "/products/:id",
  identifyCaller,
  authorize(Action.Update, ResourceType.Product, loadProductOwner),
  ProductController.updateProduct,
);

app.get("/health", (req, res) => {
  res.json({ status: "ok", service: "marketplace-api" });
});

export default app;
