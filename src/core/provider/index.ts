export {
  type HttpClient,
  type HttpResponse,
  type HttpRequestOptions,
  FetchHttpClient,
} from "./http-client";
export { type WeatherSource, fetchWeatherForCities } from "./weather-source";
export {
  OpenWeatherClient,
  type OpenWeatherClientOptions,
  parseCurrentWeather,
} from "./openweather-client";
