import axios, { type AxiosInstance } from "axios";
import { DEFAULT_USER_AGENT } from "./config";

export function createHttp(userAgent = DEFAULT_USER_AGENT, timeout = 30000): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "application/json,text/html;q=0.9,*/*;q=0.8",
    },
    timeout,
  });
}
