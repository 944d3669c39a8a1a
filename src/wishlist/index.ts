/**
 * Wishlist public API
 */

export {
  encodeWishlistLine,
  buildRowNote,
  renderWishlistHeader,
  renderWishlist,
} from "./wishlistEncoder";
export { writeWishlistFile } from "./wishlistWriter";
