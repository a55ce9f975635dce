/**
 * Static answers used when the model's reply is unusable or too generic to
 * act on. One per deployment surface.
 */

export const GENERAL_FIELD_ADVICE = `Based on typical farm conditions, here is what usually causes crop trouble and what to do about it:

**Conditions to check first:**
- Temperature above 32°C stresses most vegetable and grain crops
- Humidity under 40% combined with heat drives fast water loss
- Soil moisture under 25% starves roots; over 60% suffocates them

**Common problems and fixes:**

1. **Heat stress and wilting**:
   - Leaves lose water faster than roots can replace it
   - SOLUTION: Put 30% shade cloth over beds from 10am to 3pm

2. **Poor root growth**:
   - Hot, bare soil slows root growth and nutrient uptake
   - SOLUTION: Spread 5-8 cm of organic mulch to cool the soil and hold moisture

3. **Flower and fruit drop**:
   - Hot, dry air lowers pollen viability in flowering crops
   - SOLUTION: Water early in the morning so humidity is higher during pollination

4. **Watering pattern**:
   - Frequent light watering keeps roots shallow
   - SOLUTION: Water the soil (not the leaves) at dawn until it is moist 15-20 cm deep

5. **Nutrient loss**:
   - Heat speeds up nutrient demand and leaching
   - SOLUTION: Feed half-strength liquid fertilizer weekly instead of full strength monthly

For advice on a specific crop, tell me what you are growing and its growth stage.`;

export const SMS_FIELD_ADVICE =
  "Water at dawn, mulch 5cm, shade in peak heat. Reply with crop + stage for exact steps.";

export const QUICK_FIELD_ADVICE = `Actionable steps:
- Water at dawn until soil is moist 15 cm deep
- Mulch beds with 5 cm of straw or compost
- Shade sensitive crops from 10am to 3pm when above 32°C
- Feed half-strength fertilizer weekly
- Tell me your crop and growth stage for targeted steps`;
