/**
 * @subledger/billing - Providers
 */

export { RazorpayProvider, createRazorpayProvider, type RazorpayProviderConfig } from "./razorpay.js";
export { PayPalProvider, createPayPalProvider, type PayPalProviderConfig } from "./paypal.js";
