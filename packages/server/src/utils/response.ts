/**
 * @subledger/server - Response Serializers
 * Domain records to the snake_case wire format
 */

import type {
  CreatedSubscription,
  Invoice,
  Plan,
  Subscription,
  SubscriptionWithPlan,
} from "@subledger/billing";

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function serializePlan(plan: Plan) {
  return {
    id: plan.id,
    name: plan.name,
    description: plan.description,
    amount: plan.amount,
    currency: plan.currency,
    interval: plan.interval,
    interval_count: plan.intervalCount,
    features: plan.features,
    app_id: plan.appId,
    payment_gateways: plan.paymentGateways,
    razorpay_plan_id: plan.razorpayPlanId,
    paypal_plan_id: plan.paypalPlanId,
    plan_type: plan.planType,
    is_active: plan.isActive,
    created_at: plan.createdAt.toISOString(),
  };
}

export function serializeSubscription(subscription: Subscription) {
  return {
    id: subscription.id,
    user_id: subscription.userId,
    plan_id: subscription.planId,
    app_id: subscription.appId,
    status: subscription.status,
    razorpay_subscription_id: subscription.razorpaySubscriptionId,
    paypal_subscription_id: subscription.paypalSubscriptionId,
    current_period_start: iso(subscription.currentPeriodStart),
    current_period_end: iso(subscription.currentPeriodEnd),
    metadata: subscription.metadata,
    created_at: subscription.createdAt.toISOString(),
    updated_at: subscription.updatedAt.toISOString(),
  };
}

/**
 * A subscription with the display fields of its plan
 */
export function serializeSubscriptionWithPlan(subscription: SubscriptionWithPlan) {
  return {
    ...serializeSubscription(subscription),
    plan_name: subscription.planName,
    features: subscription.features,
    amount: subscription.amount,
    currency: subscription.currency,
    interval: subscription.interval,
  };
}

/**
 * `short_url` is the provider checkout page; null for free plans
 */
export function serializeCreatedSubscription(created: CreatedSubscription) {
  return {
    ...serializeSubscription(created.subscription),
    gateway: created.gateway,
    short_url: created.checkoutUrl,
  };
}

export function serializeInvoice(invoice: Invoice) {
  return {
    id: invoice.id,
    subscription_id: invoice.subscriptionId,
    user_id: invoice.userId,
    app_id: invoice.appId,
    razorpay_invoice_id: invoice.razorpayInvoiceId,
    paypal_invoice_id: invoice.paypalInvoiceId,
    amount: invoice.amount,
    currency: invoice.currency,
    status: invoice.status,
    payment_id: invoice.paymentId,
    invoice_date: invoice.invoiceDate.toISOString(),
    paid_at: iso(invoice.paidAt),
    created_at: invoice.createdAt.toISOString(),
  };
}
