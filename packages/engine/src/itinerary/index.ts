export {
  ItineraryPlanner,
  type ItineraryRequest,
  type ItineraryResult,
} from "./itinerary-planner.js";
