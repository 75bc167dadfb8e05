/** User lookups used by the booking core: existence only. */
import mongoose from "mongoose";

import { User } from "./model.js";

export interface UserStore {
  exists(id: string): Promise<boolean>;
}

export const mongoUserStore: UserStore = {
  async exists(id) {
    if (!mongoose.isValidObjectId(id)) return false;
    const hit = await User.exists({ _id: id });
    return hit !== null;
  },
};
